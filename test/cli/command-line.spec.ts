import { describe, it, expect } from 'vitest';
import { parseCommandLine, readExpressionLines, renderAnalysis } from '../../src/CommandLine.js';
import { UsageError } from '../../src/expr/Errors.js';
import { analyze } from '../../src/simplify/Analyzer.js';

describe('parseCommandLine', () => {
  it('should take a single expression', () => {
    expect(parseCommandLine(['x+1'])).toEqual({
      expression: 'x+1',
      help: false,
      stats: false,
      engine: {}
    });
  });

  it('should read every option', () => {
    const command = parseCommandLine(['--file', 'exprs.txt', '--stats', '--max-iterations', '5', '--verbose']);
    expect(command.file).toBe('exprs.txt');
    expect(command.stats).toBe(true);
    expect(command.engine).toEqual({ maxIterations: 5, verbose: true });
  });

  it('should accept expressions starting with a minus sign', () => {
    expect(parseCommandLine(['-x + 1']).expression).toBe('-x + 1');
  });

  it('should recognize help without an expression', () => {
    expect(parseCommandLine(['-h']).help).toBe(true);
    expect(parseCommandLine(['--help']).help).toBe(true);
  });

  it('should reject bad arguments', () => {
    expect(() => parseCommandLine([])).toThrow(new UsageError('Missing expression or --file'));
    expect(() => parseCommandLine(['--bogus'])).toThrow('Unknown option "--bogus"');
    expect(() => parseCommandLine(['x', 'y'])).toThrow('Unexpected argument "y"');
    expect(() => parseCommandLine(['--file'])).toThrow('Missing value for --file');
    expect(() => parseCommandLine(['x', '--file', 'a.txt'])).toThrow('Give either an expression or --file, not both');
  });

  it('should require a positive integer iteration cap', () => {
    expect(() => parseCommandLine(['x', '--max-iterations', '0']))
      .toThrow('Invalid max iterations "0". Must be a positive integer.');
    expect(() => parseCommandLine(['x', '--max-iterations', '2.5']))
      .toThrow('Invalid max iterations "2.5". Must be a positive integer.');
  });
});

describe('readExpressionLines', () => {
  it('should skip blank lines and comments', () => {
    expect(readExpressionLines('x+1\n\n# comment\n  2x  \n')).toEqual(['x+1', '2x']);
  });
});

describe('renderAnalysis', () => {
  it('should print every form and the best one', () => {
    expect(renderAnalysis('2x + 3x', analyze('2x + 3x'), false)).toEqual([
      'expression: 2x + 3x',
      '[EXPANDED] expanded form: 5*x',
      'best: 5*x'
    ]);
  });

  it('should print statistics on request', () => {
    expect(renderAnalysis('2x + 3x', analyze('2x + 3x'), true)).toEqual([
      'expression: 2x + 3x',
      '[EXPANDED] expanded form: 5*x',
      '    nodes=3 divisions=0 powers=0 functions=0 complexity=3 cost=2',
      'best: 5*x'
    ]);
  });
});
