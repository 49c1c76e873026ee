#!/usr/bin/env node

/**
 * radixtrie — try out the radix trie from the command line.
 *
 * Usage:
 *   radixtrie --input words.txt --complete car --render tree
 *   radixtrie -w car -w cart -r cart -f car
 */

import { parseArgs, readWords, runDemo, USAGE } from './demo';
import { UsageError } from './errors';

function main(): void {
  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return;
    }

    const words = args.input !== undefined ? readWords(args.input) : [];
    runDemo(args, [...words, ...args.words], (line) => console.log(line));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.log(USAGE);
    } else {
      console.error('radixtrie failed:', err);
    }
    process.exitCode = 1;
  }
}

main();
