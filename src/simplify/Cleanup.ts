/**
 * Local cleanup passes run between canonicalization rounds
 */

import { Expression, BinaryOp } from '../expr/AST.js';
import { ExpressionTransformer } from '../expr/ExpressionTransformer.js';
import { EPSILON, isNumber, isOne, isZero, makeNumber } from '../expr/ExpressionUtils.js';

/**
 * Evaluate a binary operation on two numbers.
 * Division by zero and non-finite results are left alone.
 */
class ConstantFolder extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);
    const { left, right } = rebuilt;

    if (!isNumber(left) || !isNumber(right)) {
      return rebuilt;
    }

    let result: number;
    switch (rebuilt.operator) {
      case '+': result = left.value + right.value; break;
      case '-': result = left.value - right.value; break;
      case '*': result = left.value * right.value; break;
      case '/':
        if (Math.abs(right.value) < EPSILON) return rebuilt;
        result = left.value / right.value;
        break;
      case '^': result = Math.pow(left.value, right.value); break;
    }

    return Number.isFinite(result) ? makeNumber(result) : rebuilt;
  }
}

class ZeroTermRemover extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);
    const { left, right } = rebuilt;

    switch (rebuilt.operator) {
      case '+':
        if (isZero(left)) return right;
        if (isZero(right)) return left;
        break;
      case '-':
        if (isZero(right)) return left;
        break;
      case '*':
        if (isZero(left) || isZero(right)) return makeNumber(0);
        break;
    }

    return rebuilt;
  }
}

class OneFactorRemover extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);

    if (rebuilt.operator === '*') {
      if (isOne(rebuilt.left)) return rebuilt.right;
      if (isOne(rebuilt.right)) return rebuilt.left;
    }

    return rebuilt;
  }
}

class PowerSimplifier extends ExpressionTransformer {
  protected visitBinary(node: BinaryOp): Expression {
    const rebuilt = this.transformChildren(node);

    if (rebuilt.operator === '^') {
      if (isZero(rebuilt.right)) return makeNumber(1);
      if (isOne(rebuilt.right)) return rebuilt.left;
    }

    return rebuilt;
  }
}

export function foldConstants(expr: Expression): Expression {
  return new ConstantFolder().transform(expr);
}

/**
 * 0 + a → a, a + 0 → a, a - 0 → a, 0·a → 0
 */
export function removeZeroTerms(expr: Expression): Expression {
  return new ZeroTermRemover().transform(expr);
}

/**
 * 1·a → a, a·1 → a
 */
export function removeOneFactors(expr: Expression): Expression {
  return new OneFactorRemover().transform(expr);
}

/**
 * a^0 → 1, a^1 → a
 */
export function simplifyPowers(expr: Expression): Expression {
  return new PowerSimplifier().transform(expr);
}
