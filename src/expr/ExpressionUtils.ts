/**
 * Shared utility functions for expression manipulation
 * Used by the canonicalizer, the rewriters and the form generator
 */

import {
  Expression,
  NumberLiteral,
  Variable,
  FunctionCall,
  BinaryOp,
  BinaryOperator
} from './AST.js';

/**
 * Tolerance for every coefficient, exponent and value comparison
 */
export const EPSILON = 1e-10;

export function approxEqual(a: number, b: number): boolean {
  return Math.abs(a - b) < EPSILON;
}

/**
 * Create a number literal
 */
export function makeNumber(value: number): NumberLiteral {
  return { kind: 'number', value };
}

/**
 * Create a variable reference
 */
export function makeVariable(name: string): Variable {
  return { kind: 'variable', name };
}

/**
 * Create a function application
 */
export function makeCall(name: string, argument: Expression): FunctionCall {
  return { kind: 'call', name, argument };
}

/**
 * Create a binary operation
 */
export function makeBinaryOp(
  operator: BinaryOperator,
  left: Expression,
  right: Expression
): BinaryOp {
  return {
    kind: 'binary',
    operator,
    left,
    right
  };
}

/**
 * Check if expression is a number literal
 */
export function isNumber(expr: Expression): expr is NumberLiteral {
  return expr.kind === 'number';
}

/**
 * Check if expression is a number literal within EPSILON of value
 */
export function isNumberValue(expr: Expression, value: number): expr is NumberLiteral {
  return expr.kind === 'number' && approxEqual(expr.value, value);
}

export function isZero(expr: Expression): boolean {
  return isNumberValue(expr, 0);
}

export function isOne(expr: Expression): boolean {
  return isNumberValue(expr, 1);
}

/**
 * Check if expression is a binary operation with the given operator
 */
export function isBinary<Op extends BinaryOperator>(expr: Expression, operator: Op): expr is BinaryOp & { readonly operator: Op } {
  return expr.kind === 'binary' && expr.operator === operator;
}

/**
 * An ADD or SUBTRACT node
 */
export function isSum(expr: Expression): expr is BinaryOp {
  return isBinary(expr, '+') || isBinary(expr, '-');
}

/**
 * A call to the named function
 */
export function isCallTo(expr: Expression, name: string): expr is FunctionCall {
  return expr.kind === 'call' && expr.name === name;
}

/**
 * Check if two expressions are structurally equal.
 * Numbers compare within EPSILON.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && approxEqual(a.value, b.value);

    case 'variable':
      return b.kind === 'variable' && a.name === b.name;

    case 'call':
      return b.kind === 'call' &&
        a.name === b.name &&
        expressionsEqual(a.argument, b.argument);

    case 'binary':
      return b.kind === 'binary' &&
        a.operator === b.operator &&
        expressionsEqual(a.left, b.left) &&
        expressionsEqual(a.right, b.right);
  }
}

/**
 * Format a number for use inside a structural key.
 * Integers print without a fraction; -0 prints as 0.
 */
export function formatKeyNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value === 0 ? 0 : value);
  }
  return String(value);
}

/**
 * Serializes an expression to structural string representation.
 * Operand order matters. Used as a map key for grouping and dedup,
 * never as the source of truth for equality.
 */
export function serializeExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'number':
      return `num(${formatKeyNumber(expr.value)})`;

    case 'variable':
      return `var(${expr.name})`;

    case 'call':
      return `call(${expr.name},${serializeExpression(expr.argument)})`;

    case 'binary':
      return `bin(${expr.operator},${serializeExpression(expr.left)},${serializeExpression(expr.right)})`;
  }
}

/**
 * Negate one addend. A leading numeric coefficient absorbs the sign.
 */
export function negateTerm(term: Expression): Expression {
  if (term.kind === 'number') {
    return makeNumber(-term.value);
  }
  if (isBinary(term, '*') && term.left.kind === 'number') {
    return makeBinaryOp('*', makeNumber(-term.left.value), term.right);
  }
  return makeBinaryOp('*', makeNumber(-1), term);
}

/**
 * Flatten the top-level +/- chain into signed addends.
 * The right side of a subtraction is negated addend by addend.
 */
export function flattenSum(expr: Expression): Expression[] {
  if (isBinary(expr, '+')) {
    return [...flattenSum(expr.left), ...flattenSum(expr.right)];
  }
  if (isBinary(expr, '-')) {
    return [...flattenSum(expr.left), ...flattenSum(expr.right).map(negateTerm)];
  }
  return [expr];
}

/**
 * Flatten a multiplication chain into its factors (never across +, -, /)
 */
export function flattenProduct(expr: Expression): Expression[] {
  if (isBinary(expr, '*')) {
    return [...flattenProduct(expr.left), ...flattenProduct(expr.right)];
  }
  return [expr];
}

/**
 * Left-associative addition chain; Number(0) when empty
 */
export function buildSum(terms: Expression[]): Expression {
  if (terms.length === 0) return makeNumber(0);
  return terms.slice(1).reduce<Expression>((acc, term) => makeBinaryOp('+', acc, term), terms[0]);
}

/**
 * Left-associative multiplication chain; Number(1) when empty
 */
export function buildProduct(factors: Expression[]): Expression {
  if (factors.length === 0) return makeNumber(1);
  return factors.slice(1).reduce<Expression>((acc, factor) => makeBinaryOp('*', acc, factor), factors[0]);
}

/**
 * Apply a rewrite until the result stops changing structurally,
 * at most maxIterations times
 */
export function fixedPoint(
  expr: Expression,
  step: (current: Expression) => Expression,
  maxIterations: number
): Expression {
  let current = expr;

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const next = step(current);
    if (expressionsEqual(next, current)) {
      return next;
    }
    current = next;
  }

  return current;
}
