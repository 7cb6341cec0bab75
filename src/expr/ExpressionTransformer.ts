/**
 * ExpressionTransformer - Abstract base class for bottom-up AST rewrites
 *
 * Provides default recursive descent for every node kind. Subclasses
 * override the visit method of the node kind they rewrite and call
 * transformChildren() to get a node whose children are already rewritten.
 *
 * Usage:
 *   class DropUnitFactors extends ExpressionTransformer {
 *     protected visitBinary(node: BinaryOp): Expression {
 *       const rebuilt = this.transformChildren(node);
 *       // match on rebuilt.left / rebuilt.right here
 *       return rebuilt;
 *     }
 *   }
 */

import {
  Expression,
  NumberLiteral,
  Variable,
  FunctionCall,
  BinaryOp
} from './AST.js';
import { makeBinaryOp, makeCall } from './ExpressionUtils.js';

export abstract class ExpressionTransformer {
  /**
   * Main entry point for transforming an expression
   * Dispatches to appropriate visit method based on node kind
   */
  transform(expr: Expression): Expression {
    switch (expr.kind) {
      case 'number':
        return this.visitNumber(expr);
      case 'variable':
        return this.visitVariable(expr);
      case 'call':
        return this.visitCall(expr);
      case 'binary':
        return this.visitBinary(expr);
    }
  }

  /**
   * Visit a number literal
   * Default: Return unchanged (identity transformation)
   */
  protected visitNumber(node: NumberLiteral): Expression {
    return node;
  }

  /**
   * Visit a variable reference
   * Default: Return unchanged (identity transformation)
   */
  protected visitVariable(node: Variable): Expression {
    return node;
  }

  /**
   * Visit a function application
   * Default: Transform the argument only; the function itself is opaque
   */
  protected visitCall(node: FunctionCall): Expression {
    return makeCall(node.name, this.transform(node.argument));
  }

  /**
   * Visit a binary operation
   * Default: Transform left and right children, return new node
   */
  protected visitBinary(node: BinaryOp): Expression {
    return this.transformChildren(node);
  }

  protected transformChildren(node: BinaryOp): BinaryOp {
    return makeBinaryOp(node.operator, this.transform(node.left), this.transform(node.right));
  }
}
