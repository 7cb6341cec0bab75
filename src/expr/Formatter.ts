/**
 * Plain-text rendering of expressions.
 * Produces minimal parentheses, e.g. "x^2 + 2*x + 1" or "(cos(x) - sin(x))/exp(x)".
 */

import { Expression, BinaryOp, BinaryOperator, PRECEDENCE } from './AST.js';
import { isNumberValue } from './ExpressionUtils.js';

/**
 * Format a number: integers without a fraction, others rounded to 10 decimals
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(parseFloat(value.toFixed(10)));
}

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'number':
      return formatNumber(expr.value);

    case 'variable':
      return expr.name;

    case 'call':
      return `${expr.name}(${formatExpression(expr.argument)})`;

    case 'binary':
      return formatBinary(expr);
  }
}

function formatBinary(node: BinaryOp): string {
  if (node.operator === '*') {
    // -1·a prints as -a, 1·a as a
    if (isNumberValue(node.left, -1)) {
      return `-${formatChild(node.right, '*', 'right')}`;
    }
    if (isNumberValue(node.left, 1)) {
      return formatChild(node.right, '*', 'right');
    }
  }

  const left = formatChild(node.left, node.operator, 'left');
  const right = formatChild(node.right, node.operator, 'right');

  switch (node.operator) {
    case '+':
      // a + -b prints as a - b
      if (right.startsWith('-')) {
        return `${left} - ${right.slice(1)}`;
      }
      return `${left} + ${right}`;
    case '-':
      // a - -b prints as a + b
      if (right.startsWith('-')) {
        return `${left} + ${right.slice(1)}`;
      }
      return `${left} - ${right}`;
    case '*':
      return `${left}*${right}`;
    case '/':
      return `${left}/${right}`;
    case '^':
      return `${left}^${right}`;
  }
}

function formatChild(child: Expression, parentOp: BinaryOperator, position: 'left' | 'right'): string {
  const text = formatExpression(child);
  return needsParens(child, parentOp, position) ? `(${text})` : text;
}

/**
 * Check if a child needs parentheses under its parent operator
 */
function needsParens(child: Expression, parentOp: BinaryOperator, position: 'left' | 'right'): boolean {
  if (child.kind === 'number') {
    if (child.value >= 0) return false;
    if (parentOp === '^') return true;
    return position === 'right' && parentOp !== '+';
  }

  if (child.kind !== 'binary') {
    return false;
  }

  const parentPrecedence = PRECEDENCE[parentOp];
  const childPrecedence = PRECEDENCE[child.operator];

  if (childPrecedence < parentPrecedence) return true;

  if (parentOp === '^') {
    return position === 'left';
  }

  if (position === 'right') {
    if (parentOp === '-' && childPrecedence === PRECEDENCE['+']) return true;
    if (parentOp === '/' && childPrecedence === PRECEDENCE['*']) return true;
  }

  return false;
}
