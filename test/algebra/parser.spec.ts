import { describe, it, expect } from 'vitest';
import { parseExpression } from '../../src/algebra/Parser.js';
import { print } from '../../src/algebra/Printer.js';
import { ParseError } from '../../src/algebra/Errors.js';
import { tokenize, TokenType } from '../../src/algebra/Lexer.js';

function roundTrip(input: string): string {
  return print(parseExpression(input));
}

describe('Expression Parser', () => {
  describe('Lexer', () => {
    it('should tokenize both power spellings', () => {
      const types = tokenize('x^2 + y**3').map(t => t.type);
      expect(types).toContain(TokenType.POWER);
      expect(types).toContain(TokenType.POWER_ALT);
      expect(types[types.length - 1]).toBe(TokenType.EOF);
    });

    it('should reject unknown characters', () => {
      expect(() => tokenize('x $ 1')).toThrow(ParseError);
      expect(() => tokenize('x $ 1')).toThrow("Unexpected character '$'");
    });
  });

  describe('Operators', () => {
    it('should accept ^ as power', () => {
      expect(roundTrip('x^2')).toBe('x**2');
    });

    it('should treat power as right-associative', () => {
      expect(roundTrip('2**3**2')).toBe('512');
    });

    it('should bind unary minus looser than power', () => {
      expect(roundTrip('-x**2')).toBe('-x**2');
    });

    it('should print division with a denominator', () => {
      expect(roundTrip('x/2')).toBe('x/2');
      expect(roundTrip('1/(2*sqrt(x))')).toBe('1/(2*sqrt(x))');
    });

    it('should parse decimals as exact rationals', () => {
      expect(roundTrip('0.5*x')).toBe('x/2');
    });
  });

  describe('Functions and constants', () => {
    it('should map aliases to canonical names', () => {
      expect(roundTrip('ln(x)')).toBe('log(x)');
      expect(roundTrip('arctan(x)')).toBe('atan(x)');
      expect(roundTrip('abs(x)')).toBe('Abs(x)');
    });

    it('should turn sqrt into a half power', () => {
      const expr = parseExpression('sqrt(x)');
      expect(expr.kind).toBe('pow');
      expect(print(expr)).toBe('sqrt(x)');
    });

    it('should rewrite a logarithm with a base as a quotient of natural logs', () => {
      expect(roundTrip('log(x, 2)')).toBe('log(x)/log(2)');
      expect(roundTrip('ln(x, 10)')).toBe('log(x)/log(10)');
      expect(roundTrip('log(x)')).toBe('log(x)');
      expect(roundTrip('log_10(x)')).toBe('log(x)/log(10)');
      expect(roundTrip('log_b(x)')).toBe('log(x)/log(b)');
      expect(roundTrip('log_e(x)')).toBe('log(x)');
    });

    it('should accept an optional order for DiracDelta', () => {
      expect(roundTrip('DiracDelta(x)')).toBe('DiracDelta(x)');
      expect(roundTrip('DiracDelta(x, 2)')).toBe('DiracDelta(x, 2)');
    });

    it('should recognize pi and e', () => {
      expect(roundTrip('pi')).toBe('pi');
      expect(roundTrip('e**x')).toBe('exp(x)');
    });
  });

  describe('Errors', () => {
    it('should reject a dangling operator', () => {
      expect(() => parseExpression('x +')).toThrow(ParseError);
    });

    it('should reject unbalanced parentheses', () => {
      expect(() => parseExpression('(x + 1')).toThrow("Expected ')' after expression");
    });

    it('should reject unknown functions', () => {
      expect(() => parseExpression('foo(x)')).toThrow("Unknown function 'foo'");
    });

    it('should check function arity', () => {
      expect(() => parseExpression('sin(x, y)')).toThrow("Function 'sin' takes 1 argument(s), got 2");
      expect(() => parseExpression('log(x, 2, 3)')).toThrow("Function 'log' takes 1 or 2 argument(s), got 3");
    });

    it('should reject empty input', () => {
      expect(() => parseExpression('')).toThrow('Expected expression');
    });

    it('should report the position', () => {
      try {
        parseExpression('x + )');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ParseError);
        if (err instanceof ParseError) {
          expect(err.line).toBe(1);
          expect(err.column).toBe(5);
        }
      }
    });
  });
});
