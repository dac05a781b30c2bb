/**
 * Lexer for math expressions.
 * Accepts both `^` and `**` for powers.
 */

import { ParseError } from './Errors.js';

export enum TokenType {
  // Literals
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  // Operators
  PLUS = 'PLUS',           // +
  MINUS = 'MINUS',         // -
  MULTIPLY = 'MULTIPLY',   // *
  DIVIDE = 'DIVIDE',       // /
  POWER = 'POWER',         // ^
  POWER_ALT = 'POWER_ALT', // **

  // Delimiters
  LPAREN = 'LPAREN',       // (
  RPAREN = 'RPAREN',       // )
  COMMA = 'COMMA',         // ,

  EOF = 'EOF',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenType>> = {
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '/': TokenType.DIVIDE,
  '^': TokenType.POWER,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  ',': TokenType.COMMA,
};

export class Lexer {
  private input: string;
  private position: number = 0;
  private line: number = 1;
  private column: number = 1;

  constructor(input: string) {
    this.input = input;
  }

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

  nextToken(): Token {
    this.skipWhitespace();

    if (this.isAtEnd()) {
      return { type: TokenType.EOF, value: '', line: this.line, column: this.column };
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

    if (char === '*') {
      this.advance();
      if (this.peek() === '*') {
        this.advance();
        return { type: TokenType.POWER_ALT, value: '**', line, column };
      }
      return { type: TokenType.MULTIPLY, value: '*', line, column };
    }

    const type = SINGLE_CHAR_TOKENS[char];
    if (type !== undefined) {
      this.advance();
      return { type, value: char, line, column };
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

    if (this.peek() === '.') {
      value += this.advance();
      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    // Scientific notation only when digits follow, so `2e` stays `2` then `e`
    const afterE = this.peekNext();
    const signedDigit =
      (afterE === '+' || afterE === '-') && this.isDigit(this.input[this.position + 2] ?? '\0');
    if ((this.peek() === 'e' || this.peek() === 'E') && (this.isDigit(afterE) || signedDigit)) {
      value += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        value += this.advance();
      }
      while (this.isDigit(this.peek())) {
        value += this.advance();
      }
    }

    return { type: TokenType.NUMBER, value, line, column };
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
      if (char === ' ' || char === '\t' || char === '\r') {
        this.advance();
      } else if (char === '\n') {
        this.position++;
        this.line++;
        this.column = 1;
      } else {
        break;
      }
    }
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.input.length) return '\0';
    return this.input[this.position + 1];
  }

  private advance(): string {
    const char = this.input[this.position++];
    this.column++;
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
}

export function tokenize(input: string): Token[] {
  return new Lexer(input).tokenize();
}
