import { describe, it, expect } from 'vitest';
import { simplify, foldNumericCoefficients, extractSquaredTrig } from '../../src/simplify/TrigRewriter.js';
import { parseExpression } from '../../src/expr/Parser.js';
import { formatExpression } from '../../src/expr/Formatter.js';
import { serializeExpression } from '../../src/expr/ExpressionUtils.js';

function trig(input: string): string {
  return formatExpression(simplify(parseExpression(input)));
}

describe('Trig Rewriter', () => {
  describe('Pythagorean identity', () => {
    it('should reduce sin² + cos² to 1', () => {
      expect(serializeExpression(simplify(parseExpression('sin(x)^2 + cos(x)^2')))).toBe('num(1)');
      expect(trig('cos(x)^2 + sin(x)^2')).toBe('1');
    });

    it('should keep a shared coefficient', () => {
      expect(trig('3*sin(x)^2 + 3*cos(x)^2')).toBe('3');
    });

    it('should find the pair inside a longer sum', () => {
      expect(trig('x + sin(x)^2 + cos(x)^2')).toBe('x + 1');
    });

    it('should require the same argument', () => {
      expect(trig('sin(x)^2 + cos(y)^2')).toBe('sin(x)^2 + cos(y)^2');
    });

    it('should require the same coefficient', () => {
      expect(trig('2*sin(x)^2 + cos(x)^2')).toBe('2*sin(x)^2 + cos(x)^2');
    });
  });

  describe('double angle', () => {
    it('should rewrite 2·sin·cos as sin(2θ)', () => {
      expect(trig('2*sin(x)*cos(x)')).toBe('sin(2*x)');
    });

    it('should halve other coefficients', () => {
      expect(trig('sin(x)*cos(x)')).toBe('0.5*sin(2*x)');
      expect(trig('6*cos(t)*sin(t)')).toBe('3*sin(2*t)');
    });

    it('should rewrite cos² - sin² as cos(2θ)', () => {
      expect(trig('cos(x)^2 - sin(x)^2')).toBe('cos(2*x)');
      expect(trig('4*cos(x)^2 - 4*sin(x)^2')).toBe('4*cos(2*x)');
    });

    it('should rewrite the canonical cos² + (-1)·sin² as cos(2θ)', () => {
      expect(trig('cos(x)^2 + -1*sin(x)^2')).toBe('cos(2*x)');
    });

    it('should leave products with other factors alone', () => {
      expect(trig('x*sin(x)*cos(x)')).toBe('x*sin(x)*cos(x)');
      expect(trig('sin(x)*cos(y)')).toBe('sin(x)*cos(y)');
    });
  });

  describe('basic identities', () => {
    it('should rewrite quotients of sin and cos', () => {
      expect(trig('sin(x)/cos(x)')).toBe('tan(x)');
      expect(trig('cos(y)/sin(y)')).toBe('cot(y)');
    });

    it('should rewrite reciprocals', () => {
      expect(trig('1/cos(x)')).toBe('sec(x)');
      expect(trig('1/sin(x)')).toBe('csc(x)');
    });

    it('should require matching arguments', () => {
      expect(trig('sin(x)/cos(y)')).toBe('sin(x)/cos(y)');
    });
  });

  describe('extractSquaredTrig', () => {
    it('should match k·f(θ)²', () => {
      const match = extractSquaredTrig(parseExpression('3*cos(2*x)^2'));
      expect(match?.coefficient).toBe(3);
      expect(match?.name).toBe('cos');
    });

    it('should reject two squared trig factors', () => {
      expect(extractSquaredTrig(parseExpression('2*sin(x)^2*cos(x)^2'))).toBeNull();
    });

    it('should reject other exponents', () => {
      expect(extractSquaredTrig(parseExpression('sin(x)^3'))).toBeNull();
    });
  });

  describe('foldNumericCoefficients', () => {
    function folded(input: string): string {
      return formatExpression(foldNumericCoefficients(parseExpression(input)));
    }

    it('should multiply adjacent numbers', () => {
      expect(folded('2*3*x')).toBe('6*x');
      expect(folded('x*2*3')).toBe('x*6');
    });

    it('should drop a unit product', () => {
      expect(folded('1*x')).toBe('x');
      expect(folded('0.5*2*x')).toBe('x');
    });

    it('should turn a chain of ones into 1', () => {
      expect(serializeExpression(foldNumericCoefficients(parseExpression('1*1')))).toBe('num(1)');
    });

    it('should not merge numbers separated by other factors', () => {
      expect(folded('2*x*3')).toBe('2*x*3');
    });
  });
});
