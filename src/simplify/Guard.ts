/**
 * Guarded rewrite steps: a step that throws leaves its input unchanged
 */

import { Expression } from '../expr/AST.js';
import { expressionsEqual } from '../expr/ExpressionUtils.js';

export type RewriteStep = (expr: Expression) => Expression;

export interface NamedStep {
  name: string;
  apply: RewriteStep;
}

export function tryApply(
  tag: string,
  step: NamedStep,
  expr: Expression,
  verbose: boolean
): Expression {
  try {
    const result = step.apply(expr);
    if (verbose) {
      const status = expressionsEqual(result, expr) ? 'unchanged' : 'changed';
      console.log(`[${tag}]   ${step.name}: ${status}`);
    }
    return result;
  } catch (error) {
    if (verbose) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(`[${tag}]   ${step.name} failed: ${message}`);
    }
    return expr;
  }
}

/**
 * Run steps in order, each guarded
 */
export function runSteps(
  tag: string,
  steps: readonly NamedStep[],
  expr: Expression,
  verbose: boolean
): Expression {
  return steps.reduce((current, step) => tryApply(tag, step, current, verbose), expr);
}
