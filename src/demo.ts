/**
 * Command-line driver for the radix trie: load words, run lookups,
 * completions and removals, and render the result.
 */

import { readFileSync } from 'node:fs';
import { resolve, extname } from 'node:path';
import { RadixTrie } from './radix';
import { RENDER_MODES, isRenderMode, type LineWriter, type RenderMode } from './render';
import { UsageError } from './errors';

// ─── Argument parsing ───────────────────────────────────────────────

export interface DemoArgs {
  input?: string;
  words: string[];
  find: string[];
  partial: boolean;
  complete: string[];
  remove: string[];
  render?: RenderMode;
  ignoreCase: boolean;
  verify: boolean;
  help: boolean;
}

/** Parse arguments (without the node and script path). */
export function parseArgs(argv: string[]): DemoArgs {
  const args: DemoArgs = {
    words: [],
    find: [],
    partial: false,
    complete: [],
    remove: [],
    ignoreCase: false,
    verify: false,
    help: false,
  };

  const value = (i: number, flag: string): string => {
    if (i >= argv.length) throw new UsageError(`${flag} requires a value`);
    return argv[i];
  };

  let i = 0;
  while (i < argv.length) {
    const flag = argv[i];
    switch (flag) {
      case '--input':
      case '-i':
        args.input = value(++i, flag);
        break;
      case '--word':
      case '-w':
        args.words.push(value(++i, flag));
        break;
      case '--find':
      case '-f':
        args.find.push(value(++i, flag));
        break;
      case '--partial':
      case '-p':
        args.partial = true;
        break;
      case '--complete':
      case '-c':
        args.complete.push(value(++i, flag));
        break;
      case '--remove':
      case '-r':
        args.remove.push(value(++i, flag));
        break;
      case '--render':
      case '-m': {
        const mode = value(++i, flag);
        if (!isRenderMode(mode)) {
          throw new UsageError(`Unknown render mode: ${mode} (expected ${RENDER_MODES.join(' or ')})`);
        }
        args.render = mode;
        break;
      }
      case '--ignore-case':
        args.ignoreCase = true;
        break;
      case '--verify':
        args.verify = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${flag}`);
    }
    i++;
  }

  if (!args.help && args.input === undefined && args.words.length === 0) {
    throw new UsageError('Provide words with --input or --word');
  }

  return args;
}

export const USAGE = `
Usage: radixtrie [--input <file>] [--word <w>]... [options]

Options:
  --input,    -i <file>    Word list (.json array of strings, otherwise one word per line)
  --word,     -w <word>    Add a word (repeatable)
  --find,     -f <query>   Report whether query is a word or a prefix (repeatable)
  --partial,  -p           Let --find queries end inside an edge label
  --complete, -c <prefix>  List completions of prefix (repeatable)
  --remove,   -r <word>    Remove a word before finds and completions (repeatable)
  --render,   -m <mode>    Print the trie: "list" (every word) or "tree" (every node)
  --ignore-case            Lower-case every word and query
  --verify                 Check trie invariants after every change
  --help,     -h           Show this help

Examples:
  radixtrie -i words.txt -c car -m tree
  radixtrie -w car -w cart -w carve -r cart -f car -f ca -p
`;

// ─── Input parsing ──────────────────────────────────────────────────

export function parseWords(content: string, ext: string): string[] {
  if (ext === '.json') {
    const data: unknown = JSON.parse(content);
    if (!Array.isArray(data)) {
      throw new UsageError('JSON input must be an array of strings');
    }
    return data.map((item: unknown) => {
      if (typeof item !== 'string') {
        throw new UsageError(`Invalid JSON entry: ${JSON.stringify(item)}`);
      }
      return item;
    });
  }

  return content
    .split('\n')
    .map((l) => l.replace(/\r$/, ''))
    .filter((l) => l.length > 0);
}

export function readWords(filepath: string): string[] {
  const content = readFileSync(resolve(filepath), 'utf-8');
  return parseWords(content, extname(filepath).toLowerCase());
}

// ─── Run ────────────────────────────────────────────────────────────

/** Build a trie from `words` and run the requested operations, writing results to `write`. */
export function runDemo(args: DemoArgs, words: string[], write: LineWriter): RadixTrie {
  const trie = new RadixTrie({ caseSensitive: !args.ignoreCase, verify: args.verify });
  for (const word of words) trie.insert(word);

  write(`Loaded ${trie.size} words into ${trie.nodeCount} nodes`);

  for (const word of args.remove) {
    write(`remove "${word}": ${trie.remove(word) ? 'removed' : 'not present'}`);
  }

  for (const query of args.find) {
    const result = trie.lookup(query, args.partial);
    write(`find "${query}": ${result === 'none' ? 'not found' : result}`);
  }

  for (const prefix of args.complete) {
    const completions = trie.complete(prefix);
    write(`complete "${prefix}": ${completions.length} suggestion(s)`);
    for (const suffix of completions) write(`  ${prefix}${suffix}`);
  }

  if (args.render) {
    trie.render(args.render, write);
  }

  return trie;
}
