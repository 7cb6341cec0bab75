/**
 * Trigonometric identity rewriting
 *
 * Each round runs three bottom-up passes (double angle, Pythagorean, basic
 * quotients) and rounds repeat until the tree stops changing.
 */

import { Expression, BinaryOp, FunctionCall } from '../expr/AST.js';
import { ExpressionTransformer } from '../expr/ExpressionTransformer.js';
import {
  approxEqual,
  buildProduct,
  buildSum,
  expressionsEqual,
  fixedPoint,
  flattenProduct,
  flattenSum,
  isBinary,
  isCallTo,
  isNumber,
  isNumberValue,
  makeBinaryOp,
  makeCall,
  makeNumber
} from '../expr/ExpressionUtils.js';
import { EngineOptions, resolveOptions } from './Options.js';

/**
 * k · f(θ)^2 with f ∈ {sin, cos}
 */
interface SquaredTrig {
  coefficient: number;
  name: 'sin' | 'cos';
  argument: Expression;
}

function trigName(expr: Expression): 'sin' | 'cos' | null {
  if (isCallTo(expr, 'sin')) return 'sin';
  if (isCallTo(expr, 'cos')) return 'cos';
  return null;
}

/**
 * Match k·sin(θ)^2 or k·cos(θ)^2. Any other non-numeric factor,
 * including a second squared trig factor, is no match.
 */
export function extractSquaredTrig(expr: Expression): SquaredTrig | null {
  let coefficient = 1;
  let match: SquaredTrig | null = null;

  for (const factor of flattenProduct(expr)) {
    if (isNumber(factor)) {
      coefficient *= factor.value;
      continue;
    }

    if (match !== null || !isBinary(factor, '^') || !isNumberValue(factor.right, 2)) {
      return null;
    }

    const base = factor.left;
    const name = trigName(base);
    if (name === null || base.kind !== 'call') {
      return null;
    }

    match = { coefficient: 1, name, argument: base.argument };
  }

  return match === null ? null : { ...match, coefficient };
}

function doubled(argument: Expression): Expression {
  return makeBinaryOp('*', makeNumber(2), argument);
}

function scaled(coefficient: number, expr: Expression): Expression {
  return approxEqual(coefficient, 1) ? expr : makeBinaryOp('*', makeNumber(coefficient), expr);
}

/**
 * k·sin(θ)·cos(θ) → (k/2)·sin(2θ)
 * k·cos(θ)^2 - k·sin(θ)^2 → k·cos(2θ), also as k·cos(θ)^2 + (-k)·sin(θ)^2
 */
class DoubleAngleRewriter extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);

    switch (rebuilt.operator) {
      case '*':
        return this.rewriteProduct(rebuilt) ?? rebuilt;
      case '-':
        return this.rewriteCosineDifference(rebuilt.left, rebuilt.right, false) ?? rebuilt;
      case '+':
        return this.rewriteCosineDifference(rebuilt.left, rebuilt.right, true) ?? rebuilt;
      default:
        return rebuilt;
    }
  }

  private rewriteProduct(node: BinaryOp): Expression | null {
    let coefficient = 1;
    let sin: FunctionCall | null = null;
    let cos: FunctionCall | null = null;

    for (const factor of flattenProduct(node)) {
      if (isNumber(factor)) {
        coefficient *= factor.value;
      } else if (isCallTo(factor, 'sin') && sin === null) {
        sin = factor;
      } else if (isCallTo(factor, 'cos') && cos === null) {
        cos = factor;
      } else {
        return null;
      }
    }

    if (sin === null || cos === null || !expressionsEqual(sin.argument, cos.argument)) {
      return null;
    }

    return scaled(coefficient / 2, makeCall('sin', doubled(sin.argument)));
  }

  private rewriteCosineDifference(left: Expression, right: Expression, negatedRight: boolean): Expression | null {
    const cos = extractSquaredTrig(left);
    const sin = extractSquaredTrig(right);

    if (cos === null || sin === null || cos.name !== 'cos' || sin.name !== 'sin') {
      return null;
    }
    if (!expressionsEqual(cos.argument, sin.argument)) {
      return null;
    }

    const sinCoefficient = negatedRight ? -sin.coefficient : sin.coefficient;
    if (!approxEqual(cos.coefficient, sinCoefficient)) {
      return null;
    }

    return scaled(cos.coefficient, makeCall('cos', doubled(cos.argument)));
  }
}

/**
 * k·sin(θ)^2 + k·cos(θ)^2 → k, for any such pair inside an addition chain
 */
class PythagoreanRewriter extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);
    if (rebuilt.operator !== '+') {
      return rebuilt;
    }

    const addends = flattenSum(rebuilt);
    const matches = addends.map(extractSquaredTrig);

    for (let i = 0; i < addends.length; i++) {
      for (let j = i + 1; j < addends.length; j++) {
        const a = matches[i];
        const b = matches[j];
        if (a === null || b === null) continue;

        if (a.name !== b.name &&
            approxEqual(a.coefficient, b.coefficient) &&
            expressionsEqual(a.argument, b.argument)) {
          const remaining = addends.filter((_, index) => index !== i && index !== j);
          return buildSum([...remaining, makeNumber(a.coefficient)]);
        }
      }
    }

    return rebuilt;
  }
}

/**
 * sin/cos → tan, cos/sin → cot, 1/cos → sec, 1/sin → csc
 */
class BasicIdentityRewriter extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);
    if (rebuilt.operator !== '/') {
      return rebuilt;
    }

    const { left, right } = rebuilt;
    const denominator = trigName(right);
    if (denominator === null || right.kind !== 'call') {
      return rebuilt;
    }

    if (isNumberValue(left, 1)) {
      return makeCall(denominator === 'cos' ? 'sec' : 'csc', right.argument);
    }

    const numerator = trigName(left);
    if (numerator === null || numerator === denominator || left.kind !== 'call') {
      return rebuilt;
    }
    if (!expressionsEqual(left.argument, right.argument)) {
      return rebuilt;
    }

    return makeCall(numerator === 'sin' ? 'tan' : 'cot', left.argument);
  }
}

/**
 * Collapse runs of adjacent numeric factors in every product chain.
 * A run whose product is 1 is dropped; a chain of only 1s becomes 1.
 */
class NumericCoefficientFolder extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);
    if (rebuilt.operator !== '*') {
      return rebuilt;
    }

    const chain = flattenProduct(rebuilt);
    const factors: Expression[] = [];
    let changed = false;
    let i = 0;

    while (i < chain.length) {
      const factor = chain[i];
      if (!isNumber(factor)) {
        factors.push(factor);
        i++;
        continue;
      }

      let product = 1;
      let count = 0;
      while (i < chain.length) {
        const next = chain[i];
        if (!isNumber(next)) break;
        product *= next.value;
        count++;
        i++;
      }

      if (approxEqual(product, 1)) {
        changed = true;
      } else {
        if (count > 1) changed = true;
        factors.push(makeNumber(product));
      }
    }

    return changed ? buildProduct(factors) : rebuilt;
  }
}

const doubleAngle = new DoubleAngleRewriter();
const pythagorean = new PythagoreanRewriter();
const basicIdentities = new BasicIdentityRewriter();

function rewriteOnce(expr: Expression): Expression {
  return basicIdentities.transform(pythagorean.transform(doubleAngle.transform(expr)));
}

export function simplify(expr: Expression, options: EngineOptions = {}): Expression {
  const { maxIterations } = resolveOptions(options);
  const rewritten = fixedPoint(expr, rewriteOnce, maxIterations);
  return foldNumericCoefficients(rewritten);
}

export function foldNumericCoefficients(expr: Expression): Expression {
  return new NumericCoefficientFolder().transform(expr);
}
