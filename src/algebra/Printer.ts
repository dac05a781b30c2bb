/**
 * Text rendering for expression trees.
 * Produces the conventional plain-text notation: `x**2 + 2*x + 1`, `sin(x)/x**2`, `1/(2*sqrt(x))`.
 * Terms and factors are printed in the order the canonical constructors store them.
 */

import { Expression, MulNode, PowNode, num } from './AST.js';
import { Rational } from './Rational.js';

export interface PrintOptions {
  /** How to render placeholder atoms; defaults to `_h<id>` */
  renderHole?: (id: number) => string;
}

const ADD_PREC = 10;
const MUL_PREC = 20;
const POW_PREC = 30;
const ATOM_PREC = 100;

const keyCache = new WeakMap<Expression, string>();

/**
 * Canonical text of an expression, used for ordering and equality.
 * Cached per node since trees are immutable.
 */
export function printKey(expr: Expression): string {
  const cached = keyCache.get(expr);
  if (cached !== undefined) return cached;
  const text = print(expr);
  keyCache.set(expr, text);
  return text;
}

export function print(expr: Expression, options: PrintOptions = {}): string {
  return new Printer(options).print(expr);
}

/**
 * True if the term prints with a leading minus sign
 */
export function isNegativeTerm(expr: Expression): boolean {
  if (expr.kind === 'number') return expr.value.isNegative();
  if (expr.kind === 'mul') {
    const first = expr.factors[0];
    return first !== undefined && first.kind === 'number' && first.value.isNegative();
  }
  return false;
}

function isSqrtExponent(expr: Expression): boolean {
  return expr.kind === 'number' && expr.value.equals(Rational.of(1n, 2n));
}

function isNegativeExponent(expr: Expression): boolean {
  return expr.kind === 'number' && expr.value.isNegative();
}

class Printer {
  constructor(private options: PrintOptions) {}

  print(expr: Expression): string {
    switch (expr.kind) {
      case 'number':
        return expr.value.toString();
      case 'symbol':
        return expr.name;
      case 'hole':
        return this.options.renderHole ? this.options.renderHole(expr.id) : `_h${expr.id}`;
      case 'call':
        return `${expr.name}(${expr.args.map(a => this.print(a)).join(', ')})`;
      case 'add':
        return this.printAdd(expr.terms);
      case 'mul':
        return this.printMul(expr);
      case 'pow':
        return this.printPow(expr);
    }
  }

  private printAdd(terms: readonly Expression[]): string {
    let out = '';
    terms.forEach((term, i) => {
      if (i === 0) {
        out = this.print(term);
      } else if (isNegativeTerm(term)) {
        out += ' - ' + this.wrap(negateTerm(term), MUL_PREC);
      } else {
        out += ' + ' + this.print(term);
      }
    });
    return out;
  }

  private printMul(expr: MulNode): string {
    let coefficient = Rational.ONE;
    let factors = expr.factors;
    const first = factors[0];
    if (first !== undefined && first.kind === 'number') {
      coefficient = first.value;
      factors = factors.slice(1);
    }
    return this.printProduct(coefficient, factors);
  }

  private printProduct(coefficient: Rational, factors: readonly Expression[]): string {
    const sign = coefficient.isNegative() ? '-' : '';
    const magnitude = coefficient.abs();
    const numerator: string[] = [];
    const denominator: string[] = [];

    if (magnitude.num !== 1n) numerator.push(magnitude.num.toString());
    if (magnitude.den !== 1n) denominator.push(magnitude.den.toString());

    for (const factor of factors) {
      if (factor.kind === 'pow' && factor.exponent.kind === 'number' && factor.exponent.value.isNegative()) {
        const positive = factor.exponent.value.neg();
        const inverted: Expression = positive.isOne()
          ? factor.base
          : { kind: 'pow', base: factor.base, exponent: num(positive) };
        denominator.push(this.wrap(inverted, MUL_PREC));
      } else {
        numerator.push(this.wrap(factor, MUL_PREC));
      }
    }

    const top = numerator.length > 0 ? numerator.join('*') : '1';
    if (denominator.length === 0) return sign + top;
    const bottom = denominator.length === 1 ? denominator[0] : `(${denominator.join('*')})`;
    return `${sign}${top}/${bottom}`;
  }

  private printPow(expr: PowNode): string {
    if (isNegativeExponent(expr.exponent)) {
      return this.printProduct(Rational.ONE, [expr]);
    }
    if (isSqrtExponent(expr.exponent)) {
      return `sqrt(${this.print(expr.base)})`;
    }
    const base = this.wrap(expr.base, POW_PREC + 1);
    const exponent = this.wrap(expr.exponent, ATOM_PREC);
    return `${base}**${exponent}`;
  }

  /**
   * Print `expr`, parenthesized when it binds looser than `minPrec`
   */
  private wrap(expr: Expression, minPrec: number): string {
    const text = this.print(expr);
    return precedence(expr) < minPrec ? `(${text})` : text;
  }
}

function precedence(expr: Expression): number {
  switch (expr.kind) {
    case 'number':
      if (expr.value.isNegative()) return ADD_PREC;
      return expr.value.isInteger() ? ATOM_PREC : MUL_PREC;
    case 'symbol':
    case 'call':
    case 'hole':
      return ATOM_PREC;
    case 'add':
      return ADD_PREC;
    case 'mul':
      return isNegativeTerm(expr) ? ADD_PREC : MUL_PREC;
    case 'pow':
      if (isNegativeExponent(expr.exponent)) return MUL_PREC;
      if (isSqrtExponent(expr.exponent)) return ATOM_PREC;
      return POW_PREC;
  }
}

/**
 * Flip the sign of a term printed with a leading minus
 */
function negateTerm(expr: Expression): Expression {
  if (expr.kind === 'number') return num(expr.value.neg());
  if (expr.kind !== 'mul') return expr;

  const [first, ...rest] = expr.factors;
  if (first === undefined || first.kind !== 'number') return expr;
  const flipped = first.value.neg();
  if (!flipped.isOne()) {
    return { kind: 'mul', factors: [num(flipped), ...rest] };
  }
  if (rest.length === 1) return rest[0];
  return { kind: 'mul', factors: rest };
}
