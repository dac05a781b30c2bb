/**
 * Exact rational numbers over bigint.
 * Every instance is normalized: positive denominator, numerator and denominator coprime.
 */

import { AlgebraError } from './Errors.js';

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

function abs(a: bigint): bigint {
  return a < 0n ? -a : a;
}

/**
 * Integer k-th root if `value` is a perfect k-th power, otherwise undefined
 */
function exactRoot(value: bigint, k: number): bigint | undefined {
  if (value < 0n) return undefined;
  if (value < 2n) return value;

  // Newton iteration on bigint, seeded above the root from the bit length
  const kb = BigInt(k);
  let guess = 1n << BigInt(Math.ceil(value.toString(2).length / k));
  for (;;) {
    const next = ((kb - 1n) * guess + value / guess ** (kb - 1n)) / kb;
    if (next >= guess) break;
    guess = next;
  }
  for (const candidate of [guess - 1n, guess, guess + 1n]) {
    if (candidate >= 0n && candidate ** kb === value) {
      return candidate;
    }
  }
  return undefined;
}

export class Rational {
  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  static readonly ZERO = new Rational(0n, 1n);
  static readonly ONE = new Rational(1n, 1n);
  static readonly MINUS_ONE = new Rational(-1n, 1n);

  static of(num: bigint | number, den: bigint | number = 1n): Rational {
    let n = typeof num === 'number' ? BigInt(num) : num;
    let d = typeof den === 'number' ? BigInt(den) : den;
    if (d === 0n) {
      throw new AlgebraError('Division by zero');
    }
    if (d < 0n) {
      n = -n;
      d = -d;
    }
    const g = gcd(n, d);
    return g > 1n ? new Rational(n / g, d / g) : new Rational(n, d);
  }

  /**
   * Parse a decimal literal such as "3", "2.5" or "1.5e-3" exactly
   */
  static parse(text: string): Rational {
    const match = /^(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text.trim());
    if (!match || (match[1] === '' && (match[2] === undefined || match[2] === ''))) {
      throw new AlgebraError(`Invalid number literal '${text}'`);
    }
    const whole = match[1] ?? '';
    const fraction = match[2] ?? '';
    const exponent = match[3] !== undefined ? parseInt(match[3], 10) : 0;

    let num = BigInt((whole || '0') + fraction);
    let den = 10n ** BigInt(fraction.length);
    if (exponent > 0) {
      num *= 10n ** BigInt(exponent);
    } else if (exponent < 0) {
      den *= 10n ** BigInt(-exponent);
    }
    return Rational.of(num, den);
  }

  /**
   * Convert a finite JS number (as found in JSON input) without floating error
   */
  static fromNumber(value: number): Rational {
    if (!Number.isFinite(value)) {
      throw new AlgebraError(`Non-finite number ${value}`);
    }
    if (Number.isInteger(value)) {
      return Rational.of(BigInt(value));
    }
    const text = String(Math.abs(value));
    const magnitude = Rational.parse(text);
    return value < 0 ? magnitude.neg() : magnitude;
  }

  add(other: Rational): Rational {
    return Rational.of(this.num * other.den + other.num * this.den, this.den * other.den);
  }

  sub(other: Rational): Rational {
    return Rational.of(this.num * other.den - other.num * this.den, this.den * other.den);
  }

  mul(other: Rational): Rational {
    return Rational.of(this.num * other.num, this.den * other.den);
  }

  div(other: Rational): Rational {
    if (other.num === 0n) {
      throw new AlgebraError('Division by zero');
    }
    return Rational.of(this.num * other.den, this.den * other.num);
  }

  neg(): Rational {
    return new Rational(-this.num, this.den);
  }

  abs(): Rational {
    return this.num < 0n ? this.neg() : this;
  }

  inv(): Rational {
    return Rational.ONE.div(this);
  }

  /**
   * Raise to an integer power
   */
  pow(exponent: bigint): Rational {
    if (exponent === 0n) return Rational.ONE;
    if (exponent < 0n) return this.inv().pow(-exponent);
    return Rational.of(this.num ** exponent, this.den ** exponent);
  }

  /**
   * Exact k-th root of a non-negative rational, or undefined if irrational
   */
  root(k: number): Rational | undefined {
    if (this.num < 0n) return undefined;
    const n = exactRoot(this.num, k);
    const d = exactRoot(this.den, k);
    return n !== undefined && d !== undefined ? Rational.of(n, d) : undefined;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  isOne(): boolean {
    return this.num === 1n && this.den === 1n;
  }

  isInteger(): boolean {
    return this.den === 1n;
  }

  isNegative(): boolean {
    return this.num < 0n;
  }

  sign(): number {
    return this.num === 0n ? 0 : this.num < 0n ? -1 : 1;
  }

  equals(other: Rational): boolean {
    return this.num === other.num && this.den === other.den;
  }

  compare(other: Rational): number {
    const diff = this.num * other.den - other.num * this.den;
    return diff === 0n ? 0 : diff < 0n ? -1 : 1;
  }

  floor(): bigint {
    const q = this.num / this.den;
    return this.num < 0n && q * this.den !== this.num ? q - 1n : q;
  }

  ceil(): bigint {
    return -this.neg().floor();
  }

  toNumber(): number {
    return Number(this.num) / Number(this.den);
  }

  toString(): string {
    return this.den === 1n ? this.num.toString() : `${this.num}/${this.den}`;
  }
}

/**
 * Greatest common divisor of two integers, always non-negative
 */
export function integerGcd(a: bigint, b: bigint): bigint {
  return gcd(a, b);
}

export function integerLcm(a: bigint, b: bigint): bigint {
  if (a === 0n || b === 0n) return 0n;
  return abs(a * b) / gcd(a, b);
}
