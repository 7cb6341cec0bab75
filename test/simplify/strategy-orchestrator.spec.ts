import { describe, it, expect, vi, afterEach } from 'vitest';
import { generateMultipleForms, iterativeSimplify, padForms } from '../../src/simplify/StrategyOrchestrator.js';
import { parseExpression } from '../../src/expr/Parser.js';
import { formatExpression } from '../../src/expr/Formatter.js';
import { SimplifiedForm, makeForm } from '../../src/simplify/Forms.js';

function summarize(forms: SimplifiedForm[]): string[][] {
  return forms.map(f => [f.kind, f.label, formatExpression(f.expression)]);
}

describe('Strategy Orchestrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('generateMultipleForms', () => {
    it('should collapse identical strategy results into one form', () => {
      const forms = generateMultipleForms(parseExpression('(x+1)(x+1)'));
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', 'x^2 + 2*x + 1']
      ]);
    });

    it('should offer a factored form', () => {
      const forms = generateMultipleForms(parseExpression('2*x^2 + 4*x'));
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', '2*x^2 + 4*x'],
        ['FACTORED', 'factored form', '2*x*(x + 2)']
      ]);
    });

    it('should apply the Pythagorean identity in the trig strategy', () => {
      const forms = generateMultipleForms(parseExpression('sin(x)^2 + cos(x)^2'));
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', 'cos(x)^2 + sin(x)^2'],
        ['STRUCTURAL', 'trigonometric simplification', '1']
      ]);
    });

    it('should factor and reduce an exponential fraction', () => {
      const forms = generateMultipleForms(parseExpression('exp(x)*(cos(x) - sin(x))/exp(x)^2'));
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', '(cos(x)*exp(x) - exp(x)*sin(x))/exp(x)^2'],
        ['FACTORED', 'factored form', 'exp(x)*(cos(x) - sin(x))/exp(x)^2'],
        ['FACTORED', 'reduced fraction', '(cos(x) - sin(x))/exp(x)']
      ]);
    });

    it('should offer structural cancellation as its own form', () => {
      const forms = generateMultipleForms(parseExpression('(x*y)/x'));
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', 'x*y/x'],
        ['FACTORED', 'common factors cancelled', 'y']
      ]);
    });

    it('should leave the reduced fraction to exp cancellation', () => {
      const forms = generateMultipleForms(parseExpression('x*exp(x)/x'));
      expect(forms.find(f => f.label === 'reduced fraction')).toBeUndefined();
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', 'x*exp(x)/x'],
        ['FACTORED', 'common factors cancelled', 'exp(x)']
      ]);
    });

    it('should fall back to the original form when generation fails', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      log.mockImplementationOnce(() => {
        throw new Error('output closed');
      });

      const input = parseExpression('x + x');
      const forms = generateMultipleForms(input, { verbose: true });

      expect(forms).toHaveLength(1);
      expect(forms[0].expression).toBe(input);
      expect(forms[0].kind).toBe('STRUCTURAL');
      expect(forms[0].label).toBe('original form');
      expect(String(log.mock.calls[1][0])).toBe('[orchestrator] form generation failed: output closed');
    });

    it('should trace steps when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      generateMultipleForms(parseExpression('x + x'), { verbose: true });

      const lines = log.mock.calls.map(call => String(call[0]));
      expect(lines[0]).toBe('[orchestrator] input: x + x');
      expect(lines).toContain('[orchestrator] added expanded form: 2*x');
    });

    it('should stay silent by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      generateMultipleForms(parseExpression('x + x'));
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('padForms', () => {
    const input = parseExpression('sin(x)^2 + cos(x)^2 + 3');

    it('should add an intermediate step and an alternative form', () => {
      const forms = padForms([makeForm(parseExpression('4'), 'STRUCTURAL', 'trigonometric simplification')], input);
      expect(summarize(forms)).toEqual([
        ['STRUCTURAL', 'trigonometric simplification', '4'],
        ['STRUCTURAL', 'intermediate step', '1 + 3'],
        ['STRUCTURAL', 'alternative form', 'cos(x)^2 + sin(x)^2 + 3']
      ]);
    });

    it('should skip padding that duplicates an existing form', () => {
      const forms = padForms([makeForm(parseExpression('cos(x)^2 + sin(x)^2 + 3'), 'EXPANDED', 'expanded form')], input);
      expect(summarize(forms)).toEqual([
        ['EXPANDED', 'expanded form', 'cos(x)^2 + sin(x)^2 + 3'],
        ['STRUCTURAL', 'intermediate step', '1 + 3']
      ]);
    });

    it('should leave three or more forms alone', () => {
      const forms = ['x', 'y', 'z'].map(name => makeForm(parseExpression(name), 'EXPANDED', name));
      expect(padForms(forms, input)).toEqual(forms);
    });
  });

  describe('iterativeSimplify', () => {
    it('should remove identity elements', () => {
      expect(formatExpression(iterativeSimplify(parseExpression('x*1 + 0')))).toBe('x');
    });

    it('should combine canonicalization and trig identities', () => {
      expect(formatExpression(iterativeSimplify(parseExpression('2*sin(x)^2 + 2*cos(x)^2 + x')))).toBe('x + 2');
    });

    it('should honor the iteration cap', () => {
      const result = iterativeSimplify(parseExpression('(x+1)(x-1)'), { maxIterations: 1 });
      expect(formatExpression(result)).toBe('x^2 - 1');
    });
  });
});
