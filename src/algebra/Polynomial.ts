/**
 * Dense univariate polynomials with exact rational coefficients.
 * Coefficients are stored lowest degree first; trailing zeros are trimmed.
 */

import { Expression, HALF, ZERO, integerValue, num, sym } from './AST.js';
import { add, mul, pow, splitCoefficient } from './Canonical.js';
import { expand } from './Expand.js';
import { Rational, integerGcd, integerLcm } from './Rational.js';

export type Polynomial = Rational[];

export interface RationalRoot {
  value: Rational;
  multiplicity: number;
}

/** Constant terms larger than this are not searched for rational roots */
const MAX_ROOT_SEARCH = 1_000_000n;

export function trim(p: Polynomial): Polynomial {
  const out = p.slice();
  while (out.length > 0 && out[out.length - 1].isZero()) out.pop();
  return out;
}

export function degree(p: Polynomial): number {
  return trim(p).length - 1;
}

/**
 * Read `expr` as a polynomial in `variable`, or undefined if it is not one
 */
export function toPolynomial(expr: Expression, variable: string): Polynomial | undefined {
  const expanded = expand(expr);
  const terms = expanded.kind === 'add' ? expanded.terms : [expanded];
  const coefficients: Polynomial = [];

  for (const term of terms) {
    const [coefficient, rest] = splitCoefficient(term);
    const power = monomialDegree(rest, variable);
    if (power === undefined) return undefined;
    while (coefficients.length <= power) coefficients.push(Rational.ZERO);
    coefficients[power] = coefficients[power].add(coefficient);
  }

  return trim(coefficients);
}

function monomialDegree(expr: Expression, variable: string): number | undefined {
  if (expr.kind === 'number') return 0;
  if (expr.kind === 'symbol') return expr.name === variable ? 1 : undefined;
  if (expr.kind === 'pow' && expr.base.kind === 'symbol' && expr.base.name === variable) {
    const k = integerValue(expr.exponent);
    return k !== undefined && k > 0n ? Number(k) : undefined;
  }
  return undefined;
}

export function fromPolynomial(p: Polynomial, variable: string): Expression {
  const x = sym(variable);
  return add(...p.map((c, i) => mul(num(c), pow(x, num(i)))));
}

/**
 * Horner evaluation
 */
export function evaluate(p: Polynomial, x: Rational): Rational {
  let acc = Rational.ZERO;
  for (let i = p.length - 1; i >= 0; i--) {
    acc = acc.mul(x).add(p[i]);
  }
  return acc;
}

/**
 * Quotient of p by (x - root); the remainder is dropped, so `root` must be a root
 */
export function divideByRoot(p: Polynomial, root: Rational): Polynomial {
  const n = p.length - 1;
  const quotient: Rational[] = new Array<Rational>(n).fill(Rational.ZERO);
  let carry = Rational.ZERO;
  for (let i = n; i >= 1; i--) {
    carry = carry.mul(root).add(p[i]);
    quotient[i - 1] = carry;
  }
  return quotient;
}

function divisors(n: bigint): bigint[] {
  const m = n < 0n ? -n : n;
  const out: bigint[] = [];
  for (let d = 1n; d * d <= m; d++) {
    if (m % d === 0n) {
      out.push(d);
      if (d * d !== m) out.push(m / d);
    }
  }
  return out;
}

/**
 * Scale to integer coefficients with content 1
 */
export function primitive(p: Polynomial): bigint[] {
  const lcm = p.reduce((acc, c) => integerLcm(acc, c.den), 1n);
  const ints = p.map(c => c.num * (lcm / c.den));
  const content = ints.reduce((acc, c) => integerGcd(acc, c), 0n);
  return content > 1n ? ints.map(c => c / content) : ints;
}

/**
 * Rational roots by the rational root theorem, ascending, with multiplicity.
 * `remainder` is what is left after dividing out every root found.
 */
export function rationalRoots(p: Polynomial): { roots: RationalRoot[]; remainder: Polynomial } {
  let current = trim(p);
  const found = new Map<string, RationalRoot>();

  const record = (value: Rational): void => {
    const key = value.toString();
    const existing = found.get(key);
    if (existing) existing.multiplicity += 1;
    else found.set(key, { value, multiplicity: 1 });
  };

  while (current.length > 1 && current[0].isZero()) {
    record(Rational.ZERO);
    current = current.slice(1);
  }

  if (current.length > 1) {
    const ints = primitive(current);
    const constant = ints[0];
    const leading = ints[ints.length - 1];
    const magnitude = (v: bigint): bigint => (v < 0n ? -v : v);

    if (magnitude(constant) <= MAX_ROOT_SEARCH && magnitude(leading) <= MAX_ROOT_SEARCH) {
      const candidates: Rational[] = [];
      for (const p0 of divisors(constant)) {
        for (const q of divisors(leading)) {
          candidates.push(Rational.of(p0, q), Rational.of(-p0, q));
        }
      }
      candidates.sort((a, b) => a.compare(b));

      let previous: Rational | undefined;
      for (const candidate of candidates) {
        if (previous !== undefined && previous.equals(candidate)) continue;
        previous = candidate;
        while (current.length > 1 && evaluate(current, candidate).isZero()) {
          record(candidate);
          current = divideByRoot(current, candidate);
        }
      }
    }
  }

  const roots = [...found.values()].sort((a, b) => a.value.compare(b.value));
  return { roots, remainder: current };
}

/**
 * Exact square root of a rational as an expression, square factors pulled out: sqrt(12) = 2*sqrt(3)
 */
export function sqrtRational(r: Rational): Expression {
  if (r.isZero()) return ZERO;
  const magnitude = r.abs();
  // sqrt(n/d) = sqrt(n*d)/d
  let radicand = magnitude.num * magnitude.den;
  let outside = 1n;
  for (let f = 2n; f * f <= radicand && f < 100_000n; f++) {
    while (radicand % (f * f) === 0n) {
      radicand /= f * f;
      outside *= f;
    }
  }
  const root = mul(num(Rational.of(outside, magnitude.den)), pow(num(radicand), HALF));
  return r.isNegative() ? mul(root, sym('I')) : root;
}

/**
 * Both roots of c0 + c1*x + c2*x**2, minus branch first
 */
export function quadraticRoots(p: Polynomial): [Expression, Expression] {
  const [c, b, a] = p;
  const discriminant = b.mul(b).sub(Rational.of(4).mul(a).mul(c));
  const twoA = Rational.of(2).mul(a);
  const vertex = num(b.neg().div(twoA));
  const offset = mul(num(twoA.inv()), sqrtRational(discriminant));
  return [add(vertex, mul(num(-1), offset)), add(vertex, offset)];
}
