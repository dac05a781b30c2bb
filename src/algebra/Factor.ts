/**
 * Factoring over the rationals.
 *
 * Pulls out the numeric content and common powers of each symbol, then splits
 * univariate polynomials into linear factors at their rational roots.
 */

import { CONSTANT_SYMBOLS, Expression, ONE, integerValue, num, sym } from './AST.js';
import { add, mul, pow, keepCoefficient, splitCoefficient } from './Canonical.js';
import { freeSymbols } from './Inspect.js';
import { Rational, integerGcd, integerLcm } from './Rational.js';
import { degree, fromPolynomial, rationalRoots, toPolynomial } from './Polynomial.js';
import { isNegativeTerm } from './Printer.js';

export function factor(expr: Expression): Expression {
  switch (expr.kind) {
    case 'add':
      return factorSum(expr.terms);
    case 'mul': {
      const [coefficient, rest] = splitCoefficient(expr);
      const parts = rest.kind === 'mul' ? rest.factors : [rest];
      return keepCoefficient(coefficient, mul(...parts.map(factor)));
    }
    case 'pow':
      return pow(factor(expr.base), expr.exponent);
    default:
      return expr;
  }
}

function factorSum(terms: readonly Expression[]): Expression {
  let content = numericContent(terms);
  if (isNegativeTerm(terms[0])) content = content.neg();

  const common = commonPowers(terms);
  const divisor = mul(num(content.inv()), ...common.map(([name, k]) => pow(sym(name), num(-k))));
  const reduced = add(...terms.map(t => mul(t, divisor)));

  const factors = [...common.map(([name, k]) => pow(sym(name), num(k))), ...splitPolynomial(reduced)];
  const leftover = factors.filter(f => f.kind === 'number');
  for (const f of leftover) {
    if (f.kind === 'number') content = content.mul(f.value);
  }
  const symbolic = factors.filter(f => f.kind !== 'number');

  return keepCoefficient(content, symbolic.length === 0 ? ONE : mul(...symbolic));
}

/**
 * Positive rational gcd of all term coefficients
 */
function numericContent(terms: readonly Expression[]): Rational {
  let numerator = 0n;
  let denominator = 1n;
  for (const term of terms) {
    const [coefficient] = splitCoefficient(term);
    numerator = integerGcd(numerator, coefficient.num);
    denominator = integerLcm(denominator, coefficient.den);
  }
  return numerator === 0n ? Rational.ONE : Rational.of(numerator, denominator);
}

/**
 * Symbols dividing every term, with the smallest exponent found
 */
function commonPowers(terms: readonly Expression[]): Array<[string, number]> {
  const out: Array<[string, number]> = [];
  const first = terms[0];
  const candidates = [...freeSymbols(first)].filter(name => !CONSTANT_SYMBOLS.has(name)).sort();

  for (const name of candidates) {
    let smallest = Infinity;
    for (const term of terms) {
      smallest = Math.min(smallest, symbolExponent(term, name));
    }
    if (smallest > 0 && Number.isFinite(smallest)) {
      out.push([name, smallest]);
    }
  }
  return out;
}

function symbolExponent(term: Expression, name: string): number {
  const factors = term.kind === 'mul' ? term.factors : [term];
  for (const f of factors) {
    if (f.kind === 'symbol' && f.name === name) return 1;
    if (f.kind === 'pow' && f.base.kind === 'symbol' && f.base.name === name) {
      const k = integerValue(f.exponent);
      return k !== undefined && k > 0n ? Number(k) : 0;
    }
  }
  return 0;
}

/**
 * Linear factors at rational roots plus whatever does not split further
 */
function splitPolynomial(expr: Expression): Expression[] {
  const symbols = [...freeSymbols(expr)];
  if (symbols.length !== 1) return [expr];
  const variable = symbols[0];

  const p = toPolynomial(expr, variable);
  if (p === undefined || degree(p) < 2) return [expr];

  const { roots, remainder } = rationalRoots(p);
  if (roots.length === 0) return [expr];

  const x = sym(variable);
  const factors: Expression[] = [];
  let scale = Rational.ONE;
  for (const { value, multiplicity } of roots) {
    // root p/q becomes the integer factor (q*x - p)
    const linear = add(mul(num(value.den), x), num(-value.num));
    factors.push(pow(linear, num(multiplicity)));
    scale = scale.mul(Rational.of(value.den).pow(BigInt(multiplicity)));
  }

  const rest = fromPolynomial(remainder.map(c => c.div(scale)), variable);
  return rest.kind === 'number' && rest.value.isOne() ? factors : [...factors, rest];
}
