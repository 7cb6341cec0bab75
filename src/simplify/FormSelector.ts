/**
 * Cost model for picking the form that differentiates most cheaply.
 * Products and quotients multiply their children's cost because their
 * derivative rules duplicate subtrees.
 */

import { Expression } from '../expr/AST.js';
import { FormSelectionError } from '../expr/Errors.js';
import { SimplifiedForm } from './Forms.js';

export function differentiationCost(expr: Expression): number {
  switch (expr.kind) {
    case 'number':
      return 0;

    case 'variable':
      return 1;

    case 'call':
      return 3 + differentiationCost(expr.argument);

    case 'binary': {
      const left = differentiationCost(expr.left);
      switch (expr.operator) {
        case '+':
        case '-':
          return left + differentiationCost(expr.right) + 1;
        case '*':
          return (left + differentiationCost(expr.right)) * 2;
        case '/':
          return (left + differentiationCost(expr.right)) * 3;
        case '^':
          if (expr.right.kind === 'number') {
            return 2 * left + 2;
          }
          return (left + differentiationCost(expr.right)) * 4;
      }
    }
  }
}

/**
 * Index of the cheapest candidate; the first wins ties
 */
function cheapestIndex(expressions: readonly Expression[]): number {
  let bestIndex = 0;
  let bestCost = differentiationCost(expressions[0]);

  for (let i = 1; i < expressions.length; i++) {
    const cost = differentiationCost(expressions[i]);
    if (cost < bestCost) {
      bestCost = cost;
      bestIndex = i;
    }
  }

  return bestIndex;
}

export function selectBestForDifferentiation(expressions: readonly Expression[]): Expression {
  if (expressions.length === 0) {
    throw new FormSelectionError('no candidate expressions', 0);
  }

  return expressions[cheapestIndex(expressions)];
}

export function selectBestForm(forms: readonly SimplifiedForm[]): SimplifiedForm {
  if (forms.length === 0) {
    throw new FormSelectionError('no candidate forms', 0);
  }

  return forms[cheapestIndex(forms.map(form => form.expression))];
}

export interface FormStatistics {
  nodes: number;
  divisions: number;
  powers: number;
  functions: number;
  /** nodes + 5·divisions + 3·powers + 2·functions */
  complexity: number;
  cost: number;
}

function countNodes(expr: Expression, matches: (node: Expression) => boolean): number {
  const self = matches(expr) ? 1 : 0;
  switch (expr.kind) {
    case 'number':
    case 'variable':
      return self;
    case 'call':
      return self + countNodes(expr.argument, matches);
    case 'binary':
      return self + countNodes(expr.left, matches) + countNodes(expr.right, matches);
  }
}

export function formStatistics(expr: Expression): FormStatistics {
  const nodes = countNodes(expr, () => true);
  const divisions = countNodes(expr, node => node.kind === 'binary' && node.operator === '/');
  const powers = countNodes(expr, node => node.kind === 'binary' && node.operator === '^');
  const functions = countNodes(expr, node => node.kind === 'call');

  return {
    nodes,
    divisions,
    powers,
    functions,
    complexity: nodes + 5 * divisions + 3 * powers + 2 * functions,
    cost: differentiationCost(expr)
  };
}
