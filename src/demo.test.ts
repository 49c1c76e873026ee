import { join } from 'node:path';
import { describe, test, expect } from 'vitest';
import { parseArgs, parseWords, readWords, runDemo } from './demo';
import { UsageError } from './errors';

function run(argv: string[]): string[] {
  const args = parseArgs(argv);
  const lines: string[] = [];
  runDemo(args, args.words, (line) => lines.push(line));
  return lines;
}

describe('parseArgs', () => {
  test('collects repeatable flags', () => {
    const args = parseArgs(['-w', 'car', '--word', 'cart', '-f', 'ca', '-p', '-m', 'list', '--verify']);
    expect(args.words).toEqual(['car', 'cart']);
    expect(args.find).toEqual(['ca']);
    expect(args.partial).toBe(true);
    expect(args.render).toBe('list');
    expect(args.verify).toBe(true);
    expect(args.ignoreCase).toBe(false);
  });

  test('rejects bad arguments', () => {
    expect(() => parseArgs([])).toThrow('Provide words with --input or --word');
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown argument: --bogus');
    expect(() => parseArgs(['-w'])).toThrow('-w requires a value');
    expect(() => parseArgs(['-w', 'a', '-m', 'json'])).toThrow(UsageError);
  });

  test('help needs no words', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });
});

describe('parseWords', () => {
  test('reads one word per line, keeping spaces', () => {
    expect(parseWords('car\r\ncart\n\n dog\n', '.txt')).toEqual(['car', 'cart', ' dog']);
  });

  test('reads a JSON array of strings', () => {
    expect(parseWords('["a", "b"]', '.json')).toEqual(['a', 'b']);
    expect(() => parseWords('[1]', '.json')).toThrow('Invalid JSON entry: 1');
    expect(() => parseWords('{}', '.json')).toThrow(UsageError);
  });

  test('reads a word file from disk', () => {
    expect(readWords(join(__dirname, 'fixtures', 'words.txt'))).toEqual(['car', 'cart', 'carve']);
  });
});

describe('runDemo', () => {
  test('runs removes, finds, completions and rendering in order', () => {
    const lines = run([
      '-w', 'car', '-w', 'cart',
      '-r', 'cart', '-r', 'cart',
      '-f', 'car', '-f', 'ca', '-f', 'cat', '-p',
      '-c', 'ca',
      '-m', 'tree',
    ]);
    expect(lines).toEqual([
      'Loaded 2 words into 3 nodes',
      'remove "cart": removed',
      'remove "cart": not present',
      'find "car": word',
      'find "ca": prefix',
      'find "cat": not found',
      'complete "ca": 1 suggestion(s)',
      '  car',
      '#',
      '## car *',
    ]);
  });

  test('exact finds do not stop inside an edge', () => {
    expect(run(['-w', 'car', '-f', 'ca'])).toEqual(['Loaded 1 words into 2 nodes', 'find "ca": not found']);
  });

  test('--ignore-case lower-cases the words', () => {
    expect(run(['-w', 'Berlin', '--ignore-case', '-m', 'list'])).toEqual([
      'Loaded 1 words into 2 nodes',
      'berlin',
    ]);
  });
});
