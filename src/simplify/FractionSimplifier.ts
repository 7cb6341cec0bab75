/**
 * Structural cancellation of factors shared by numerator and denominator
 */

import { Expression } from '../expr/AST.js';
import {
  buildProduct,
  expressionsEqual,
  flattenProduct,
  isBinary,
  isOne,
  makeBinaryOp
} from '../expr/ExpressionUtils.js';
import { EngineOptions } from './Options.js';
import { canonicalize } from './Canonicalizer.js';

/**
 * Remove each denominator factor that also occurs in the numerator.
 * Each denominator factor cancels at most one numerator factor.
 */
function removeCommonFactors(
  numerator: readonly Expression[],
  denominator: readonly Expression[]
): { numerator: Expression[]; denominator: Expression[] } {
  const remaining = [...numerator];
  const kept: Expression[] = [];

  for (const factor of denominator) {
    const index = remaining.findIndex(candidate => expressionsEqual(candidate, factor));
    if (index >= 0) {
      remaining.splice(index, 1);
    } else {
      kept.push(factor);
    }
  }

  return { numerator: remaining, denominator: kept };
}

export function cancelCommonFactors(expr: Expression, options: EngineOptions = {}): Expression {
  if (!isBinary(expr, '/')) {
    return expr;
  }

  const numerator = canonicalize(expr.left, options);
  const denominator = canonicalize(expr.right, options);

  const reduced = removeCommonFactors(flattenProduct(numerator), flattenProduct(denominator));
  const newNumerator = buildProduct(reduced.numerator);
  const newDenominator = buildProduct(reduced.denominator);

  if (isOne(newDenominator)) {
    return newNumerator;
  }

  return makeBinaryOp('/', newNumerator, newDenominator);
}
