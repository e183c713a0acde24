#!/usr/bin/env node

import { readFileSync } from 'fs';
import { parseExpression } from './symbolic/Parser.js';
import { Simplifier } from './symbolic/Simplify.js';
import type { SimplifyOptions } from './symbolic/Simplify.js';
import { ParseError, formatParseError } from './symbolic/Errors.js';

function printUsage() {
  console.log(`
expr-simplify - Single-sweep simplifier for algebraic expressions

Usage:
  expr-simplify <expression...> [options]
  expr-simplify --file <path> [options]

Options:
  --file <path>             Read expressions from a file, one per line
  --max-depth <n>           Recursion depth limit (default: 32)
  --factorial-limit <n>     Largest literal folded by n! (default: 10)
  --verbose                 Log each rewrite
  --help, -h                Show this help message

Examples:
  expr-simplify "x + x + 2 * 3"
  expr-simplify "(a + b) + c" "4!" --verbose
  expr-simplify --file expressions.txt

Expression syntax:
  integers, symbols, + * ^ (or **), postfix ! and parentheses.
  Lines starting with # in --file input are ignored.
  `.trim());
}

function readInteger(args: string[], i: number, flag: string): number {
  if (i >= args.length) {
    console.error(`Error: Missing value for ${flag}`);
    process.exit(1);
  }
  const value = Number(args[i]);
  if (!Number.isInteger(value) || value < 0) {
    console.error(`Error: Invalid value "${args[i]}" for ${flag}. Must be a non-negative integer.`);
    process.exit(1);
  }
  return value;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const options: SimplifyOptions = {};
  const expressions: string[] = [];
  let inputFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--file') {
      if (i + 1 >= args.length) {
        console.error('Error: Missing value for --file');
        process.exit(1);
      }
      inputFile = args[++i];
    } else if (arg === '--max-depth') {
      options.maxDepth = readInteger(args, ++i, arg);
    } else if (arg === '--factorial-limit') {
      options.factorialLimit = readInteger(args, ++i, arg);
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('--')) {
      console.error(`Error: Unknown option "${arg}"`);
      printUsage();
      process.exit(1);
    } else {
      expressions.push(arg);
    }
  }

  if (inputFile !== undefined) {
    let input: string;
    try {
      input = readFileSync(inputFile, 'utf-8');
    } catch (err) {
      console.error(`Error: Could not read file "${inputFile}"`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      process.exit(1);
    }

    for (const line of input.split('\n')) {
      const trimmed = line.trim();
      if (trimmed.length > 0 && !trimmed.startsWith('#')) {
        expressions.push(trimmed);
      }
    }
  }

  if (expressions.length === 0) {
    console.error('Error: No expressions given');
    process.exit(1);
  }

  let simplifier: Simplifier;
  try {
    simplifier = new Simplifier(options);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  for (const source of expressions) {
    try {
      const result = simplifier.run(parseExpression(source));
      console.log(result.toString());
    } catch (err) {
      if (err instanceof ParseError) {
        console.error(formatParseError(err, source));
      } else if (err instanceof Error) {
        console.error(`Error: Failed to simplify "${source}"`);
        console.error(err.message);
      } else {
        console.error(`Error: Failed to simplify "${source}"`);
      }
      process.exit(1);
    }
  }
}

main();
