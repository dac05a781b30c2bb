/**
 * Parser for math expressions.
 * Builds canonical trees directly: subtraction becomes `a + (-1)*b`, division `a * b**-1`.
 */

import { Expression, HALF, MINUS_ONE, E, PI, num, sym } from './AST.js';
import { add, mul, pow, call, neg, div } from './Canonical.js';
import { ParseError } from './Errors.js';
import { Token, TokenType, Lexer } from './Lexer.js';
import { Rational } from './Rational.js';

/**
 * Known functions and their arity, keyed by every accepted spelling.
 * `log` and `DiracDelta` take an optional second argument (base, order).
 */
const ARITY: Readonly<Record<string, number | readonly [number, number]>> = {
  sin: 1, cos: 1, tan: 1, sec: 1, csc: 1, cot: 1,
  asin: 1, acos: 1, atan: 1, asec: 1, acsc: 1, acot: 1,
  sinh: 1, cosh: 1, tanh: 1, asinh: 1, acosh: 1, atanh: 1,
  exp: 1, log: [1, 2], sqrt: 1, erf: 1, gamma: 1, sign: 1, floor: 1, ceiling: 1,
  Abs: 1, Heaviside: 1, DiracDelta: [1, 2], polygamma: 2
};

interface FunctionInfo {
  name: string;
  minArity: number;
  maxArity: number;
}

const FUNCTIONS: ReadonlyMap<string, FunctionInfo> = new Map(
  Object.entries(ARITY).map(([name, arity]): [string, FunctionInfo] => {
    const [minArity, maxArity] = typeof arity === 'number' ? [arity, arity] : arity;
    return [name, { name, minArity, maxArity }];
  })
);

const LOG_BASE = /^log_([0-9]+|[A-Za-z][A-Za-z0-9]*)$/;

const ALIASES: Readonly<Record<string, string>> = {
  ln: 'log',
  arcsin: 'asin',
  arccos: 'acos',
  arctan: 'atan',
  abs: 'Abs',
  heaviside: 'Heaviside',
  ceil: 'ceiling'
};

export class Parser {
  private tokens: Token[];
  private current: number = 0;

  constructor(input: string) {
    this.tokens = new Lexer(input).tokenize();
  }

  parse(): Expression {
    if (this.check(TokenType.EOF)) {
      const token = this.peek();
      throw new ParseError('Expected expression', token.line, token.column);
    }
    const expr = this.additive();
    if (!this.check(TokenType.EOF)) {
      const token = this.peek();
      throw new ParseError(`Unexpected '${token.value}'`, token.line, token.column, token.value);
    }
    return expr;
  }

  private additive(): Expression {
    let expr = this.multiplicative();

    while (this.match(TokenType.PLUS, TokenType.MINUS)) {
      const operator = this.previous();
      const right = this.multiplicative();
      expr = operator.type === TokenType.PLUS ? add(expr, right) : add(expr, neg(right));
    }

    return expr;
  }

  private multiplicative(): Expression {
    let expr = this.unary();

    while (this.match(TokenType.MULTIPLY, TokenType.DIVIDE)) {
      const operator = this.previous();
      const right = this.unary();
      expr = operator.type === TokenType.MULTIPLY ? mul(expr, right) : mul(expr, pow(right, MINUS_ONE));
    }

    return expr;
  }

  private unary(): Expression {
    if (this.match(TokenType.MINUS)) {
      return neg(this.unary());
    }
    if (this.match(TokenType.PLUS)) {
      return this.unary();
    }
    return this.power();
  }

  /**
   * Right-associative: 2**3**2 = 2**(3**2); -x**2 = -(x**2)
   */
  private power(): Expression {
    const base = this.primary();

    if (this.match(TokenType.POWER, TokenType.POWER_ALT)) {
      const exponent = this.unary();
      return pow(base, exponent);
    }

    return base;
  }

  private primary(): Expression {
    if (this.match(TokenType.NUMBER)) {
      const token = this.previous();
      return num(Rational.parse(token.value));
    }

    if (this.match(TokenType.IDENTIFIER)) {
      return this.identifier(this.previous());
    }

    if (this.match(TokenType.LPAREN)) {
      const expr = this.additive();
      this.consume(TokenType.RPAREN, "Expected ')' after expression");
      return expr;
    }

    const token = this.peek();
    const found = token.type === TokenType.EOF ? 'end of input' : `'${token.value}'`;
    throw new ParseError(`Expected expression, found ${found}`, token.line, token.column, token.value);
  }

  private identifier(token: Token): Expression {
    const based = LOG_BASE.exec(token.value);
    if (based && this.check(TokenType.LPAREN)) {
      return this.logWithBase(token, based[1]);
    }

    const spelled = ALIASES[token.value] ?? token.value;
    const fn = FUNCTIONS.get(spelled);

    if (this.check(TokenType.LPAREN)) {
      if (!fn) {
        throw new ParseError(`Unknown function '${token.value}'`, token.line, token.column, token.value);
      }
      this.advance();
      const args = this.argumentList();
      this.consume(TokenType.RPAREN, `Expected ')' after arguments to ${token.value}`);
      if (args.length < fn.minArity || args.length > fn.maxArity) {
        const arity = fn.minArity === fn.maxArity ? `${fn.minArity}` : `${fn.minArity} or ${fn.maxArity}`;
        throw new ParseError(
          `Function '${token.value}' takes ${arity} argument(s), got ${args.length}`,
          token.line,
          token.column,
          token.value
        );
      }
      if (fn.name === 'sqrt') {
        return pow(args[0], HALF);
      }
      if (fn.name === 'log' && args.length === 2) {
        // change of base: log(x, b) = log(x)/log(b)
        return div(call('log', [args[0]]), call('log', [args[1]]));
      }
      return call(fn.name, args);
    }

    if (fn) {
      throw new ParseError(`Function '${token.value}' requires arguments`, token.line, token.column, token.value);
    }

    switch (token.value) {
      case 'pi':
        return PI;
      case 'e':
      case 'E':
        return E;
      default:
        return sym(token.value);
    }
  }

  /**
   * log_b(x), e.g. log_10(x) or log_a(x), as log(x)/log(b)
   */
  private logWithBase(token: Token, baseText: string): Expression {
    this.advance();
    const args = this.argumentList();
    this.consume(TokenType.RPAREN, `Expected ')' after arguments to ${token.value}`);
    if (args.length !== 1) {
      throw new ParseError(
        `Function '${token.value}' takes 1 argument(s), got ${args.length}`,
        token.line,
        token.column,
        token.value
      );
    }
    let base: Expression;
    if (/^[0-9]+$/.test(baseText)) base = num(BigInt(baseText));
    else if (baseText === 'e' || baseText === 'E') base = E;
    else base = sym(baseText);
    return div(call('log', [args[0]]), call('log', [base]));
  }

  private argumentList(): Expression[] {
    const args: Expression[] = [];
    if (this.check(TokenType.RPAREN)) {
      return args;
    }
    do {
      args.push(this.additive());
    } while (this.match(TokenType.COMMA));
    return args;
  }

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
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.check(TokenType.EOF)) this.current++;
    return this.previous();
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    const token = this.peek();
    throw new ParseError(message, token.line, token.column, token.value);
  }
}

export function parseExpression(input: string): Expression {
  return new Parser(input).parse();
}
