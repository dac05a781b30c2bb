import { describe, it, expect } from 'vitest';
import { Rational } from '../../src/algebra/Rational.js';
import { AlgebraError } from '../../src/algebra/Errors.js';

describe('Rational', () => {
  it('should normalize sign and common factors', () => {
    expect(Rational.of(2, 4).toString()).toBe('1/2');
    expect(Rational.of(3, -6).toString()).toBe('-1/2');
    expect(Rational.of(10, 5).toString()).toBe('2');
  });

  it('should reject a zero denominator', () => {
    expect(() => Rational.of(1, 0)).toThrow(AlgebraError);
  });

  it('should parse decimal literals exactly', () => {
    expect(Rational.parse('2.5').toString()).toBe('5/2');
    expect(Rational.parse('1.5e-3').toString()).toBe('3/2000');
    expect(Rational.parse('.25').toString()).toBe('1/4');
    expect(() => Rational.parse('1.2.3')).toThrow(AlgebraError);
  });

  it('should convert JSON numbers without floating error', () => {
    expect(Rational.fromNumber(0.1).toString()).toBe('1/10');
    expect(Rational.fromNumber(-0.75).toString()).toBe('-3/4');
    expect(Rational.fromNumber(7).toString()).toBe('7');
  });

  it('should do exact arithmetic', () => {
    const third = Rational.of(1, 3);
    const sixth = Rational.of(1, 6);
    expect(third.add(sixth).toString()).toBe('1/2');
    expect(third.sub(sixth).toString()).toBe('1/6');
    expect(third.mul(sixth).toString()).toBe('1/18');
    expect(third.div(sixth).toString()).toBe('2');
    expect(Rational.of(2, 3).pow(-2n).toString()).toBe('9/4');
  });

  it('should find exact roots only', () => {
    expect(Rational.of(4, 9).root(2)?.toString()).toBe('2/3');
    expect(Rational.of(27).root(3)?.toString()).toBe('3');
    expect(Rational.of(2).root(2)).toBeUndefined();
  });

  it('should find exact roots of integers beyond double precision', () => {
    expect(Rational.of(10n ** 400n).root(2)?.toString()).toBe((10n ** 200n).toString());
    expect(Rational.of(1n, 3n ** 300n).root(3)?.toString()).toBe(`1/${(3n ** 100n).toString()}`);
    expect(Rational.of(2n ** 1001n).root(2)).toBeUndefined();
    expect(Rational.of(10n ** 400n + 1n).root(2)).toBeUndefined();
  });

  it('should round toward the right integer', () => {
    expect(Rational.of(-7, 2).floor()).toBe(-4n);
    expect(Rational.of(-7, 2).ceil()).toBe(-3n);
    expect(Rational.of(7, 2).floor()).toBe(3n);
  });
});
