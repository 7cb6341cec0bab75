/**
 * Parser for algebraic expressions
 *
 * Grammar (precedence from lowest to highest):
 *   expression     → multiplicative (('+' | '-') multiplicative)*
 *   multiplicative → unary (('*' | '/') unary | implicit)*
 *   implicit       → power            (when an identifier or '(' follows directly)
 *   unary          → ('-' | '+') unary | power
 *   power          → primary (('^' | '**') unary)?    right-associative
 *   primary        → NUMBER | IDENTIFIER | call | '(' expression ')'
 *   call           → FUNCTION_NAME '(' expression ')'
 */

import { Expression } from './AST.js';
import { Token, TokenType, Lexer } from './Lexer.js';
import { ParseError } from './Errors.js';
import { makeBinaryOp, makeCall, makeNumber, makeVariable } from './ExpressionUtils.js';

/**
 * Names parsed as function applications when followed by '('
 */
export const KNOWN_FUNCTIONS: ReadonlySet<string> = new Set([
  'sin', 'cos', 'tan', 'cot', 'sec', 'csc',
  'asin', 'acos', 'atan',
  'sinh', 'cosh', 'tanh',
  'exp', 'ln', 'log', 'sqrt', 'abs'
]);

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(input: string) {
    const lexer = new Lexer(input);
    this.tokens = lexer.tokenize();
  }

  /**
   * Parse the whole input as one expression
   */
  parse(): Expression {
    const expr = this.expression();

    if (!this.isAtEnd()) {
      throw this.error(this.peek(), `Unexpected '${this.peek().value}' after expression`);
    }

    return expr;
  }

  private expression(): Expression {
    return this.additive();
  }

  /**
   * Parse additive expression (+ and -)
   */
  private additive(): Expression {
    let expr = this.multiplicative();

    while (this.match(TokenType.PLUS, TokenType.MINUS)) {
      const operator = this.previous().type === TokenType.PLUS ? '+' : '-';
      const right = this.multiplicative();
      expr = makeBinaryOp(operator, expr, right);
    }

    return expr;
  }

  /**
   * Parse multiplicative expression (*, / and implicit products like 3x)
   */
  private multiplicative(): Expression {
    let expr = this.unary();

    while (true) {
      if (this.match(TokenType.MULTIPLY, TokenType.DIVIDE)) {
        const operator = this.previous().type === TokenType.MULTIPLY ? '*' : '/';
        const right = this.unary();
        expr = makeBinaryOp(operator, expr, right);
      } else if (this.check(TokenType.IDENTIFIER) || this.check(TokenType.LPAREN)) {
        const right = this.power();
        expr = makeBinaryOp('*', expr, right);
      } else {
        break;
      }
    }

    return expr;
  }

  /**
   * Parse unary expression (- and +)
   */
  private unary(): Expression {
    if (this.match(TokenType.MINUS)) {
      const operand = this.unary();
      if (operand.kind === 'number') {
        return makeNumber(-operand.value);
      }
      return makeBinaryOp('*', makeNumber(-1), operand);
    }

    if (this.match(TokenType.PLUS)) {
      return this.unary();
    }

    return this.power();
  }

  /**
   * Parse power expression (^ and **)
   */
  private power(): Expression {
    const base = this.primary();

    // Right-associative; the exponent may carry its own sign (x^-1)
    if (this.match(TokenType.POWER, TokenType.POWER_ALT)) {
      const exponent = this.unary();
      return makeBinaryOp('^', base, exponent);
    }

    return base;
  }

  /**
   * Parse primary expression
   */
  private primary(): Expression {
    if (this.match(TokenType.NUMBER)) {
      const token = this.previous();
      const value = parseFloat(token.value);
      if (Number.isNaN(value)) {
        throw this.error(token, `Invalid number '${token.value}'`);
      }
      return makeNumber(value);
    }

    if (this.match(TokenType.IDENTIFIER)) {
      const name = this.previous().value;

      if (KNOWN_FUNCTIONS.has(name) && this.match(TokenType.LPAREN)) {
        const argument = this.expression();
        this.consume(TokenType.RPAREN, `Expected ')' after argument of ${name}`);
        return makeCall(name, argument);
      }

      return makeVariable(name);
    }

    // Parenthesized expression
    if (this.match(TokenType.LPAREN)) {
      const expr = this.expression();
      this.consume(TokenType.RPAREN, "Expected ')' after expression");
      return expr;
    }

    throw this.error(this.peek(), 'Expected expression');
  }

  // Helper methods

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  private error(token: Token, message: string): ParseError {
    return new ParseError(message, token.line, token.column, token.value);
  }
}

/**
 * Convenience function to parse input
 */
export function parseExpression(input: string): Expression {
  const parser = new Parser(input);
  return parser.parse();
}
