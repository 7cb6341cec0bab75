/**
 * AST nodes for algebraic expressions.
 *
 * Nodes are plain immutable values. Every transformation builds a new tree,
 * and two trees are compared structurally (see ExpressionUtils).
 */

/**
 * Expression types
 */
export type Expression =
  | NumberLiteral
  | Variable
  | FunctionCall
  | BinaryOp;

/**
 * Number literal
 */
export interface NumberLiteral {
  readonly kind: 'number';
  readonly value: number;
}

/**
 * Free symbol
 */
export interface Variable {
  readonly kind: 'variable';
  readonly name: string;
}

/**
 * Opaque unary function application (sin, cos, exp, ln, sqrt, ...)
 */
export interface FunctionCall {
  readonly kind: 'call';
  readonly name: string;
  readonly argument: Expression;
}

export type BinaryOperator = '+' | '-' | '*' | '/' | '^';

/**
 * Binary operation
 */
export interface BinaryOp {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

/**
 * Operator binding strength, loosest first
 */
export const PRECEDENCE: Record<BinaryOperator, number> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
  '^': 3
};
