import { describe, it, expect } from 'vitest';
import {
  buildProduct,
  buildSum,
  expressionsEqual,
  fixedPoint,
  flattenProduct,
  flattenSum,
  makeBinaryOp,
  makeCall,
  makeNumber,
  makeVariable,
  negateTerm,
  serializeExpression
} from '../../src/expr/ExpressionUtils.js';
import { parseExpression } from '../../src/expr/Parser.js';
import { Expression } from '../../src/expr/AST.js';

describe('Expression Serialization', () => {
  it('should serialize every node kind', () => {
    expect(serializeExpression(makeNumber(42))).toBe('num(42)');
    expect(serializeExpression(makeNumber(-3.14))).toBe('num(-3.14)');
    expect(serializeExpression(makeVariable('x'))).toBe('var(x)');
    expect(serializeExpression(makeCall('sin', makeVariable('x')))).toBe('call(sin,var(x))');
    expect(serializeExpression(makeBinaryOp('*', makeNumber(2), makeVariable('x')))).toBe('bin(*,num(2),var(x))');
  });

  it('should distinguish operand order', () => {
    const a = makeBinaryOp('+', makeVariable('x'), makeVariable('y'));
    const b = makeBinaryOp('+', makeVariable('y'), makeVariable('x'));
    expect(serializeExpression(a)).not.toBe(serializeExpression(b));
  });

  it('should print negative zero as zero', () => {
    expect(serializeExpression(makeNumber(-0))).toBe('num(0)');
  });
});

describe('expressionsEqual', () => {
  it('should compare numbers within tolerance', () => {
    expect(expressionsEqual(makeNumber(1), makeNumber(1 + 1e-12))).toBe(true);
    expect(expressionsEqual(makeNumber(1), makeNumber(1.001))).toBe(false);
  });

  it('should compare trees structurally', () => {
    expect(expressionsEqual(parseExpression('sin(x+1)*2'), parseExpression('sin(x + 1) * 2'))).toBe(true);
    expect(expressionsEqual(parseExpression('sin(x)'), parseExpression('cos(x)'))).toBe(false);
    expect(expressionsEqual(parseExpression('x'), parseExpression('2'))).toBe(false);
  });
});

describe('flatten and build helpers', () => {
  it('should negate subtracted addends', () => {
    const addends = flattenSum(parseExpression('a - (b + c)')).map(serializeExpression);
    expect(addends).toEqual(['var(a)', 'bin(*,num(-1),var(b))', 'bin(*,num(-1),var(c))']);
  });

  it('should let a numeric coefficient absorb the sign', () => {
    expect(serializeExpression(negateTerm(parseExpression('2*x')))).toBe('bin(*,num(-2),var(x))');
    expect(serializeExpression(negateTerm(makeNumber(3)))).toBe('num(-3)');
  });

  it('should flatten products without crossing other operators', () => {
    const factors = flattenProduct(parseExpression('2*x*(y + 1)/z'));
    expect(factors).toHaveLength(1);
    expect(flattenProduct(parseExpression('2*x*(y + 1)')).map(serializeExpression)).toEqual([
      'num(2)', 'var(x)', 'bin(+,var(y),num(1))'
    ]);
  });

  it('should build left-associative chains with identities when empty', () => {
    expect(serializeExpression(buildSum([]))).toBe('num(0)');
    expect(serializeExpression(buildProduct([]))).toBe('num(1)');
    expect(serializeExpression(buildSum([makeVariable('a'), makeVariable('b'), makeVariable('c')])))
      .toBe('bin(+,bin(+,var(a),var(b)),var(c))');
  });
});

describe('fixedPoint', () => {
  it('should stop when the tree stops changing', () => {
    let calls = 0;
    const halve = (expr: Expression): Expression => {
      calls++;
      if (expr.kind === 'number' && expr.value > 1) {
        return makeNumber(Math.floor(expr.value / 2));
      }
      return expr;
    };

    const result = fixedPoint(makeNumber(8), halve, 10);
    expect(serializeExpression(result)).toBe('num(1)');
    expect(calls).toBe(4);
  });

  it('should stop after the iteration cap', () => {
    const grow = (expr: Expression): Expression => makeBinaryOp('+', expr, makeNumber(1));
    const result = fixedPoint(makeVariable('x'), grow, 2);
    expect(serializeExpression(result)).toBe('bin(+,bin(+,var(x),num(1)),num(1))');
  });
});
