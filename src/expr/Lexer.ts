/**
 * Lexer for algebraic expressions
 * Tokenizes input with support for ^, **, × and implicit products
 */

import { ParseError } from './Errors.js';

export enum TokenType {
  // Literals
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Operators
  PLUS = 'PLUS',           // +
  MINUS = 'MINUS',         // -
  MULTIPLY = 'MULTIPLY',   // * or ×
  DIVIDE = 'DIVIDE',       // /
  POWER = 'POWER',         // ^
  POWER_ALT = 'POWER_ALT', // **

  // Delimiters
  LPAREN = 'LPAREN',       // (
  RPAREN = 'RPAREN',       // )

  // Special
  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(input: string) {
    this.input = input;
  }

  /**
   * Get all tokens, ending with EOF
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token = this.nextToken();

    while (token.type !== TokenType.EOF) {
      tokens.push(token);
      token = this.nextToken();
    }

    tokens.push(token);
    return tokens;
  }

  /**
   * Get next token
   */
  nextToken(): Token {
    this.skipWhitespace();

    if (this.isAtEnd()) {
      return this.makeToken(TokenType.EOF, '');
    }

    const char = this.peek();
    const line = this.line;
    const column = this.column;

    if (this.isDigit(char) || (char === '.' && this.isDigit(this.peekNext()))) {
      return this.number();
    }

    if (this.isAlpha(char)) {
      return this.identifier();
    }

    switch (char) {
      case '+':
        this.advance();
        return { type: TokenType.PLUS, value: '+', line, column };
      case '-':
        this.advance();
        return { type: TokenType.MINUS, value: '-', line, column };
      case '/':
        this.advance();
        return { type: TokenType.DIVIDE, value: '/', line, column };
      case '(':
        this.advance();
        return { type: TokenType.LPAREN, value: '(', line, column };
      case ')':
        this.advance();
        return { type: TokenType.RPAREN, value: ')', line, column };
      case '^':
        this.advance();
        return { type: TokenType.POWER, value: '^', line, column };
      case '×':
        this.advance();
        return { type: TokenType.MULTIPLY, value: '×', line, column };
      case '*':
        this.advance();
        if (this.peek() === '*') {
          this.advance();
          return { type: TokenType.POWER_ALT, value: '**', line, column };
        }
        return { type: TokenType.MULTIPLY, value: '*', line, column };
    }

    throw new ParseError(`Unexpected character '${char}'`, line, column, char);
  }

  private number(): Token {
    const line = this.line;
    const column = this.column;
    let value = '';

    while (this.isDigit(this.peek())) {
      value += this.advance();
    }

    // Handle decimal point
    if (this.peek() === '.' && this.isDigit(this.peekNext())) {
      value += this.advance(); // consume '.'

      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    // Scientific notation only when digits follow, so "2e" stays 2·e
    if ((this.peek() === 'e' || this.peek() === 'E') && this.startsExponent()) {
      value += this.advance(); // consume 'e'

      if (this.peek() === '+' || this.peek() === '-') {
        value += this.advance();
      }

      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return { type: TokenType.NUMBER, value, line, column };
  }

  private startsExponent(): boolean {
    const next = this.peekNext();
    if (this.isDigit(next)) return true;
    if (next === '+' || next === '-') {
      return this.isDigit(this.peekAt(2));
    }
    return false;
  }

  private identifier(): Token {
    const line = this.line;
    const column = this.column;
    let value = '';

    while (this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    return { type: TokenType.IDENTIFIER, value, line, column };
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\r' || char === '\t' || char === '\n') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private peek(): string {
    return this.peekAt(0);
  }

  private peekNext(): string {
    return this.peekAt(1);
  }

  private peekAt(offset: number): string {
    if (this.position + offset >= this.input.length) return '\0';
    return this.input[this.position + offset];
  }

  private advance(): string {
    const char = this.input[this.position++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char);
  }

  private makeToken(type: TokenType, value: string): Token {
    return {
      type,
      value,
      line: this.line,
      column: this.column
    };
  }
}

/**
 * Convenience function to tokenize input
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}
