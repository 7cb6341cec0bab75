#!/usr/bin/env node

import { readFileSync } from 'fs';
import { ParseError, UsageError, formatParseError } from './expr/Errors.js';
import { analyze } from './simplify/Analyzer.js';
import { CommandLine, parseCommandLine, readExpressionLines, renderAnalysis } from './CommandLine.js';

function printUsage() {
  console.log(`
symbolic-forms - Equivalent forms of algebraic expressions

Usage:
  symbolic-forms <expression> [options]
  symbolic-forms --file <path> [options]

Options:
  --file <path>           Read one expression per line (# starts a comment)
  --max-iterations <n>    Cap on every fixed-point loop (default: 10)
  --stats                 Print size and cost statistics for each form
  --verbose               Trace every rewrite step
  --help, -h              Show this help message

Examples:
  symbolic-forms "(x+1)(x+1)"
  symbolic-forms "exp(x)(cos(x) - sin(x))/exp(x)^2" --stats
  symbolic-forms --file expressions.txt

Syntax:
  Numbers, variables, + - * / ^ (or **), parentheses and implicit
  products such as 3x or 2sin(x). Known functions: sin, cos, tan, cot,
  sec, csc, exp, ln, log, sqrt, abs, asin, acos, atan, sinh, cosh, tanh.
  `.trim());
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printUsage();
    process.exit(0);
  }

  let command: CommandLine;
  try {
    command = parseCommandLine(args);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  if (command.help) {
    printUsage();
    process.exit(0);
  }

  let sources: string[];
  if (command.file !== undefined) {
    try {
      sources = readExpressionLines(readFileSync(command.file, 'utf-8'));
    } catch (err) {
      console.error(`Error: Could not read file "${command.file}"`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      process.exit(1);
    }
    if (sources.length === 0) {
      console.error('Error: No expressions found in input file');
      process.exit(1);
    }
  } else {
    sources = [command.expression ?? ''];
  }

  const verbose = command.engine.verbose ?? false;
  const outputs: string[] = [];

  for (const source of sources) {
    try {
      const result = analyze(source, command.engine);
      outputs.push(renderAnalysis(source, result, command.stats).join('\n'));
    } catch (err) {
      if (err instanceof ParseError) {
        console.error(formatParseError(err, source, verbose));
      } else {
        console.error(`Error: Failed to analyze "${source}"`);
        if (err instanceof Error) {
          console.error(err.message);
        }
      }
      process.exit(1);
    }
  }

  console.log(outputs.join('\n\n'));
}

main();
