/**
 * Canonical multiplicative decomposition of one additive summand:
 *   coefficient × Π variable^e × Π function^e × Π nested
 */

import { Expression, FunctionCall, BinaryOp } from '../expr/AST.js';
import {
  EPSILON,
  approxEqual,
  buildProduct,
  expressionsEqual,
  flattenProduct,
  makeBinaryOp,
  makeNumber,
  makeVariable,
  serializeExpression
} from '../expr/ExpressionUtils.js';

/**
 * A function factor together with its accumulated exponent
 */
export interface FunctionFactor {
  readonly call: FunctionCall;
  readonly exponent: number;
}

export interface Term {
  readonly coefficient: number;
  /** Variable name -> exponent; near-zero exponents are never stored */
  readonly variables: ReadonlyMap<string, number>;
  /** FunctionKey -> factor; near-zero exponents are never stored */
  readonly functions: ReadonlyMap<string, FunctionFactor>;
  /** Opaque factors, compared structurally and in order */
  readonly nested: readonly Expression[];
}

/**
 * Canonical identity of a function application: name plus structural argument
 */
export function functionKey(call: FunctionCall): string {
  return `${call.name}(${serializeExpression(call.argument)})`;
}

export function makeTerm(
  coefficient: number,
  variables: Iterable<[string, number]> = [],
  functions: Iterable<[string, FunctionFactor]> = [],
  nested: readonly Expression[] = []
): Term {
  return {
    coefficient,
    variables: new Map([...variables].filter(([, exponent]) => Math.abs(exponent) >= EPSILON)),
    functions: new Map([...functions].filter(([, factor]) => Math.abs(factor.exponent) >= EPSILON)),
    nested
  };
}

export function constantTerm(value: number): Term {
  return makeTerm(value);
}

export function withCoefficient(term: Term, coefficient: number): Term {
  return { ...term, coefficient };
}

export function isZeroTerm(term: Term): boolean {
  return Math.abs(term.coefficient) < EPSILON;
}

export function isConstantTerm(term: Term): boolean {
  return term.variables.size === 0 && term.functions.size === 0 && term.nested.length === 0;
}

/**
 * Sum of variable exponents
 */
export function totalDegree(term: Term): number {
  let degree = 0;
  for (const exponent of term.variables.values()) {
    degree += exponent;
  }
  return degree;
}

/**
 * Decompose an expression into a Term. Anything that is not a number,
 * variable, function, numeric power of one of those, or a product of such
 * factors is kept whole as a nested factor.
 */
export function termFromExpression(expr: Expression): Term {
  switch (expr.kind) {
    case 'number':
      return constantTerm(expr.value);

    case 'variable':
      return makeTerm(1, [[expr.name, 1]]);

    case 'call':
      return makeTerm(1, [], [[functionKey(expr), { call: expr, exponent: 1 }]]);

    case 'binary':
      if (expr.operator === '*') {
        return flattenProduct(expr)
          .map(termFromExpression)
          .reduce(multiplyTerms, constantTerm(1));
      }
      if (expr.operator === '^') {
        return termFromPower(expr);
      }
      return makeTerm(1, [], [], [expr]);
  }
}

function termFromPower(node: BinaryOp): Term {
  const base = node.left;
  const exponent = node.right;

  if (exponent.kind !== 'number') {
    return makeTerm(1, [], [], [node]);
  }

  switch (base.kind) {
    case 'variable':
      return makeTerm(1, [[base.name, exponent.value]]);
    case 'number':
      return constantTerm(Math.pow(base.value, exponent.value));
    case 'call':
      return makeTerm(1, [], [[functionKey(base), { call: base, exponent: exponent.value }]]);
    default:
      return makeTerm(1, [], [], [node]);
  }
}

function addExponents<V>(
  left: ReadonlyMap<string, V>,
  right: ReadonlyMap<string, V>,
  combine: (a: V | undefined, b: V) => V
): Map<string, V> {
  const result = new Map(left);
  for (const [key, value] of right) {
    result.set(key, combine(result.get(key), value));
  }
  return result;
}

/**
 * Product of two Terms: coefficients multiply, exponents add, nested factors concatenate
 */
export function multiplyTerms(a: Term, b: Term): Term {
  const variables = addExponents(a.variables, b.variables, (x, y) => (x ?? 0) + y);
  const functions = addExponents(a.functions, b.functions, (x, y) => ({
    call: y.call,
    exponent: (x?.exponent ?? 0) + y.exponent
  }));

  return makeTerm(a.coefficient * b.coefficient, variables, functions, [...a.nested, ...b.nested]);
}

/**
 * Quotient term / divisor. Remaining exponents of either sign are kept;
 * the divisor's nested factors are ignored.
 */
export function divideTerm(term: Term, divisor: Term): Term {
  const variables = addExponents(term.variables, divisor.variables, (x, y) => (x ?? 0) - y);
  const functions = addExponents(term.functions, divisor.functions, (x, y) => ({
    call: x?.call ?? y.call,
    exponent: (x?.exponent ?? 0) - y.exponent
  }));

  return makeTerm(term.coefficient / divisor.coefficient, variables, functions, term.nested);
}

function mapsEqual<V>(
  a: ReadonlyMap<string, V>,
  b: ReadonlyMap<string, V>,
  equal: (x: V, y: V) => boolean
): boolean {
  if (a.size !== b.size) return false;
  for (const [key, value] of a) {
    const other = b.get(key);
    if (other === undefined || !equal(value, other)) {
      return false;
    }
  }
  return true;
}

/**
 * Like terms: same variables, same functions (keys and exponents),
 * and the same nested factors in the same order
 */
export function termsSimilar(a: Term, b: Term): boolean {
  return mapsEqual(a.variables, b.variables, approxEqual) &&
    mapsEqual(a.functions, b.functions, (x, y) => approxEqual(x.exponent, y.exponent)) &&
    a.nested.length === b.nested.length &&
    a.nested.every((expr, i) => expressionsEqual(expr, b.nested[i]));
}

/**
 * Code-unit string ordering, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function formatExponent(exponent: number): string {
  const rounded = Math.round(exponent);
  if (approxEqual(exponent, rounded)) {
    return String(rounded);
  }
  return String(exponent);
}

function keyPart(base: string, exponent: number): string {
  return approxEqual(exponent, 1) ? base : `${base}^${formatExponent(exponent)}`;
}

function sortedEntries<V>(map: ReadonlyMap<string, V>): [string, V][] {
  return [...map.entries()].sort(([a], [b]) => compareStrings(a, b));
}

/**
 * Grouping key built from everything but the coefficient
 */
export function baseKey(term: Term): string {
  const parts = [
    ...sortedEntries(term.variables).map(([name, exponent]) => keyPart(name, exponent)),
    ...sortedEntries(term.functions).map(([key, factor]) => keyPart(key, factor.exponent)),
    ...term.nested.map(serializeExpression)
  ];

  return parts.length === 0 ? '1' : parts.join('*');
}

function withExponent(base: Expression, exponent: number): Expression {
  return approxEqual(exponent, 1) ? base : makeBinaryOp('^', base, makeNumber(exponent));
}

/**
 * Render a Term as a left-associative product.
 * A coefficient of ±1 contributes no factor, except the leading -1 for a negative sign.
 */
export function termToExpression(term: Term): Expression {
  if (isZeroTerm(term)) return makeNumber(0);

  const factors: Expression[] = [
    ...sortedEntries(term.variables).map(([name, exponent]) => withExponent(makeVariable(name), exponent)),
    ...sortedEntries(term.functions).map(([, factor]) => withExponent(factor.call, factor.exponent)),
    ...term.nested
  ];

  if (factors.length === 0) {
    return makeNumber(term.coefficient);
  }

  if (approxEqual(term.coefficient, 1)) {
    return buildProduct(factors);
  }

  if (approxEqual(term.coefficient, -1)) {
    return buildProduct([makeNumber(-1), ...factors]);
  }

  return buildProduct([makeNumber(term.coefficient), ...factors]);
}
