/**
 * Canonical polynomial form
 *
 * Pipeline: fullyExpand → extractTerms → mergeTerms → sortTerms → buildExpression.
 * A fraction at the root is canonicalized side by side; the bar is never crossed.
 */

import { Expression, BinaryOp } from '../expr/AST.js';
import {
  EPSILON,
  approxEqual,
  buildSum,
  flattenSum,
  isBinary,
  isNumber,
  isOne,
  isSum,
  isZero,
  makeBinaryOp,
  makeCall,
  makeNumber
} from '../expr/ExpressionUtils.js';
import { EngineOptions, resolveOptions } from './Options.js';
import {
  Term,
  baseKey,
  compareStrings,
  isConstantTerm,
  isZeroTerm,
  multiplyTerms,
  termFromExpression,
  termToExpression,
  termsSimilar,
  totalDegree,
  withCoefficient
} from './Term.js';

export function canonicalize(expr: Expression, options: EngineOptions = {}): Expression {
  const { maxExpansionPower } = resolveOptions(options);

  // A sum can collapse to a lone quotient, which then takes the fraction path
  const root = isBinary(expr, '/') ? expr : canonicalizeSum(expr, maxExpansionPower);
  if (isBinary(root, '/')) {
    return makeBinaryOp(
      '/',
      canonicalizeSum(root.left, maxExpansionPower),
      canonicalizeSum(root.right, maxExpansionPower)
    );
  }

  return root;
}

function canonicalizeSum(expr: Expression, maxExpansionPower: number): Expression {
  const expanded = fullyExpand(expr, maxExpansionPower);
  return buildExpression(sortTerms(mergeTerms(extractTerms(expanded))));
}

/**
 * Distribute every product over sums and expand small integer powers of sums.
 * Divisions are expanded on each side but never distributed.
 */
export function fullyExpand(expr: Expression, maxExpansionPower: number = 10): Expression {
  switch (expr.kind) {
    case 'number':
    case 'variable':
      return expr;

    case 'call':
      return makeCall(expr.name, fullyExpand(expr.argument, maxExpansionPower));

    case 'binary':
      switch (expr.operator) {
        case '+':
        case '-':
        case '/':
          return makeBinaryOp(
            expr.operator,
            fullyExpand(expr.left, maxExpansionPower),
            fullyExpand(expr.right, maxExpansionPower)
          );
        case '*':
          return expandMultiplication(
            fullyExpand(expr.left, maxExpansionPower),
            fullyExpand(expr.right, maxExpansionPower)
          );
        case '^':
          return expandPower(expr, maxExpansionPower);
      }
  }
}

/**
 * Product of two expanded operands; sums are cross-multiplied addend by addend
 */
export function expandMultiplication(left: Expression, right: Expression): Expression {
  if (!isSum(left) && !isSum(right)) {
    return multiplySimpleTerms(left, right);
  }

  const rightAddends = flattenSum(right);
  const products = flattenSum(left).flatMap(a =>
    rightAddends.map(b => multiplySimpleTerms(a, b))
  );

  return buildSum(products);
}

/**
 * Multiply two operands that are not sums
 */
export function multiplySimpleTerms(left: Expression, right: Expression): Expression {
  if (isNumber(left) && isNumber(right)) {
    return makeNumber(left.value * right.value);
  }
  if (isZero(left) || isZero(right)) return makeNumber(0);
  if (isOne(left)) return right;
  if (isOne(right)) return left;

  return termToExpression(multiplyTerms(termFromExpression(left), termFromExpression(right)));
}

function expandPower(node: BinaryOp, maxExpansionPower: number): Expression {
  const base = fullyExpand(node.left, maxExpansionPower);
  const exponent = fullyExpand(node.right, maxExpansionPower);

  if (!isNumber(exponent)) {
    return makeBinaryOp('^', base, exponent);
  }

  // (a^m)^n → a^(m·n)
  if (isBinary(base, '^') && isNumber(base.right)) {
    const collapsed = makeBinaryOp('^', base.left, makeNumber(base.right.value * exponent.value));
    return fullyExpand(collapsed, maxExpansionPower);
  }

  const n = exponent.value;

  if (isNumber(base)) return makeNumber(Math.pow(base.value, n));
  if (approxEqual(n, 0)) return makeNumber(1);
  if (approxEqual(n, 1)) return base;

  if (isSum(base) && Number.isInteger(n) && n > 1 && n <= maxExpansionPower) {
    let result: Expression = base;
    for (let i = 1; i < n; i++) {
      result = expandMultiplication(result, base);
    }
    return result;
  }

  return makeBinaryOp('^', base, exponent);
}

/**
 * Signed addends of the top-level sum, each decomposed to a Term
 */
export function extractTerms(expr: Expression): Term[] {
  return flattenSum(expr).map(termFromExpression);
}

/**
 * Combine like terms. Terms are grouped by base key and merged only
 * when fully similar; merged coefficients near zero are dropped.
 */
export function mergeTerms(terms: readonly Term[]): Term[] {
  const groups = new Map<string, Term[]>();

  for (const term of terms) {
    if (isZeroTerm(term)) continue;

    const key = baseKey(term);
    const group = groups.get(key) ?? [];
    const index = group.findIndex(existing => termsSimilar(existing, term));

    if (index >= 0) {
      const existing = group[index];
      group[index] = withCoefficient(existing, existing.coefficient + term.coefficient);
    } else {
      group.push(term);
    }

    groups.set(key, group);
  }

  return [...groups.values()].flat().filter(term => !isZeroTerm(term));
}

function compareTerms(a: Term, b: Term): number {
  const aConstant = isConstantTerm(a);
  const bConstant = isConstantTerm(b);
  if (aConstant !== bConstant) {
    return aConstant ? 1 : -1;
  }

  // Higher degree first
  const degree = totalDegree(b) - totalDegree(a);
  if (Math.abs(degree) >= EPSILON) {
    return degree;
  }

  const key = compareStrings(baseKey(a), baseKey(b));
  if (key !== 0) {
    return key;
  }

  return a.coefficient - b.coefficient;
}

/**
 * Deterministic term order: constants last, then degree descending,
 * base key, coefficient
 */
export function sortTerms(terms: readonly Term[]): Term[] {
  return [...terms].sort(compareTerms);
}

/**
 * Left-associative sum of the terms; Number(0) when empty
 */
export function buildExpression(terms: readonly Term[]): Expression {
  return buildSum(terms.map(termToExpression));
}
