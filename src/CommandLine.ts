/**
 * Argument parsing and output rendering for the command-line tool
 */

import { UsageError } from './expr/Errors.js';
import { formatExpression } from './expr/Formatter.js';
import { EngineOptions } from './simplify/Options.js';
import { AnalysisResult } from './simplify/Analyzer.js';
import { formStatistics } from './simplify/FormSelector.js';

export interface CommandLine {
  /** Expression given directly on the command line */
  expression?: string;
  /** File with one expression per line */
  file?: string;
  help: boolean;
  stats: boolean;
  engine: EngineOptions;
}

function requireValue(args: readonly string[], index: number, option: string): string {
  if (index >= args.length) {
    throw new UsageError(`Missing value for ${option}`);
  }
  return args[index];
}

export function parseCommandLine(args: readonly string[]): CommandLine {
  const command: CommandLine = { help: false, stats: false, engine: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      command.help = true;
    } else if (arg === '--stats') {
      command.stats = true;
    } else if (arg === '--verbose') {
      command.engine.verbose = true;
    } else if (arg === '--file') {
      command.file = requireValue(args, ++i, '--file');
    } else if (arg === '--max-iterations') {
      const value = requireValue(args, ++i, '--max-iterations');
      const iterations = Number(value);
      if (!Number.isInteger(iterations) || iterations <= 0) {
        throw new UsageError(`Invalid max iterations "${value}". Must be a positive integer.`);
      }
      command.engine.maxIterations = iterations;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option "${arg}"`);
    } else if (command.expression === undefined) {
      command.expression = arg;
    } else {
      throw new UsageError(`Unexpected argument "${arg}"`);
    }
  }

  if (command.help) {
    return command;
  }

  if (command.expression !== undefined && command.file !== undefined) {
    throw new UsageError('Give either an expression or --file, not both');
  }
  if (command.expression === undefined && command.file === undefined) {
    throw new UsageError('Missing expression or --file');
  }

  return command;
}

/**
 * Non-empty lines that are not # comments
 */
export function readExpressionLines(content: string): string[] {
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export function renderAnalysis(source: string, result: AnalysisResult, showStats: boolean): string[] {
  const lines = [`expression: ${source}`];

  for (const form of result.forms) {
    lines.push(`[${form.kind}] ${form.label}: ${formatExpression(form.expression)}`);
    if (showStats) {
      const stats = formStatistics(form.expression);
      lines.push(
        `    nodes=${stats.nodes} divisions=${stats.divisions} powers=${stats.powers} ` +
        `functions=${stats.functions} complexity=${stats.complexity} cost=${stats.cost}`
      );
    }
  }

  lines.push(`best: ${formatExpression(result.best.expression)}`);
  return lines;
}
