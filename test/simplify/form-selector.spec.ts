import { describe, it, expect } from 'vitest';
import {
  differentiationCost,
  formStatistics,
  selectBestForDifferentiation,
  selectBestForm
} from '../../src/simplify/FormSelector.js';
import { displayForms, makeForm } from '../../src/simplify/Forms.js';
import { FormSelectionError } from '../../src/expr/Errors.js';
import { parseExpression } from '../../src/expr/Parser.js';

function cost(input: string): number {
  return differentiationCost(parseExpression(input));
}

describe('Form Selector', () => {
  describe('differentiationCost', () => {
    it('should price leaves', () => {
      expect(cost('7')).toBe(0);
      expect(cost('x')).toBe(1);
      expect(cost('sin(x)')).toBe(4);
    });

    it('should price sums, products and quotients', () => {
      expect(cost('x + 1')).toBe(2);
      expect(cost('2*x')).toBe(2);
      expect(cost('x/(x+1)')).toBe(9);
    });

    it('should price numeric and symbolic powers differently', () => {
      expect(cost('x^2')).toBe(4);
      expect(cost('x^y')).toBe(8);
      expect(cost('x*(x+1)^-1')).toBe(14);
    });
  });

  describe('selectBestForDifferentiation', () => {
    it('should pick the cheapest candidate', () => {
      const inverse = parseExpression('x*(x+1)^-1');
      const quotient = parseExpression('x/(x+1)');
      expect(selectBestForDifferentiation([inverse, quotient])).toBe(quotient);
    });

    it('should prefer the first candidate on ties', () => {
      const a = parseExpression('x + y');
      const b = parseExpression('y + x');
      expect(selectBestForDifferentiation([a, b])).toBe(a);
    });

    it('should return a single candidate', () => {
      const only = parseExpression('sin(x)');
      expect(selectBestForDifferentiation([only])).toBe(only);
    });

    it('should reject an empty list', () => {
      expect(() => selectBestForDifferentiation([])).toThrow(FormSelectionError);
      expect(() => selectBestForDifferentiation([])).toThrow('Form selection error: no candidate expressions');
    });
  });

  describe('selectBestForm', () => {
    it('should select among labeled forms', () => {
      const expanded = makeForm(parseExpression('x*(x+1)^-1'), 'EXPANDED', 'expanded form');
      const reduced = makeForm(parseExpression('x/(x+1)'), 'FACTORED', 'reduced fraction');
      expect(selectBestForm([expanded, reduced])).toBe(reduced);
    });

    it('should reject an empty list', () => {
      expect(() => selectBestForm([])).toThrow('Form selection error: no candidate forms');
    });
  });

  describe('formStatistics', () => {
    it('should count nodes by kind', () => {
      expect(formStatistics(parseExpression('sin(x)/x^2'))).toEqual({
        nodes: 6,
        divisions: 1,
        powers: 1,
        functions: 1,
        complexity: 16,
        cost: 24
      });
    });
  });
});

describe('displayForms', () => {
  it('should drop later structural duplicates', () => {
    const forms = displayForms([
      makeForm(parseExpression('x + 1'), 'EXPANDED', 'expanded form'),
      makeForm(parseExpression('(x + 1)'), 'FACTORED', 'factored form'),
      makeForm(parseExpression('1 + x'), 'STRUCTURAL', 'alternative form')
    ]);
    expect(forms.map(f => f.label)).toEqual(['expanded form', 'alternative form']);
  });
});
