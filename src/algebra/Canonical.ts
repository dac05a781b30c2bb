/**
 * Canonicalizing constructors.
 *
 * Every tree built through these functions is in canonical form: sums and products
 * are flattened, numeric parts folded, like terms and equal bases collected, and
 * operands ordered deterministically. Two equal canonical trees print identically,
 * which is what `equals` in Inspect.ts relies on.
 */

import {
  Expression,
  CONSTANT_SYMBOLS,
  ONE,
  ZERO,
  MINUS_ONE,
  num
} from './AST.js';
import { AlgebraError, AlgebraInputError } from './Errors.js';
import { printKey, isNegativeTerm } from './Printer.js';
import { Rational } from './Rational.js';

/** Largest root index tried when folding numeric powers like 8**(1/3) */
const MAX_EXACT_ROOT = 64;

/** Largest numeric power folded to an exact value, in bits of numerator or denominator */
const MAX_POWER_BITS = 65536;

export function add(...terms: Expression[]): Expression {
  let constant = Rational.ZERO;
  const groups = new Map<string, { coefficient: Rational; rest: Expression }>();

  for (const term of flattenTerms(terms)) {
    if (term.kind === 'number') {
      constant = constant.add(term.value);
      continue;
    }
    const [coefficient, rest] = splitCoefficient(term);
    const key = printKey(rest);
    const existing = groups.get(key);
    if (existing) {
      existing.coefficient = existing.coefficient.add(coefficient);
    } else {
      groups.set(key, { coefficient, rest });
    }
  }

  const out: Expression[] = [];
  for (const { coefficient, rest } of groups.values()) {
    if (!coefficient.isZero()) {
      out.push(keepCoefficient(coefficient, rest));
    }
  }
  if (!constant.isZero()) {
    out.push(num(constant));
  }

  if (out.length === 0) return ZERO;
  if (out.length === 1) return out[0];
  out.sort(compareTerms);
  return { kind: 'add', terms: out };
}

export function mul(...factors: Expression[]): Expression {
  let coefficient = Rational.ONE;
  const groups = new Map<string, { base: Expression; exponents: Expression[] }>();

  for (const factor of flattenFactors(factors)) {
    if (factor.kind === 'number') {
      coefficient = coefficient.mul(factor.value);
      continue;
    }
    const base = factor.kind === 'pow' ? factor.base : factor;
    const exponent = factor.kind === 'pow' ? factor.exponent : ONE;
    const key = printKey(base);
    const existing = groups.get(key);
    if (existing) {
      existing.exponents.push(exponent);
    } else {
      groups.set(key, { base, exponents: [exponent] });
    }
  }

  if (coefficient.isZero()) return ZERO;

  const rebuilt: Expression[] = [];
  let reflatten = false;
  for (const { base, exponents } of groups.values()) {
    const combined = pow(base, exponents.length === 1 ? exponents[0] : add(...exponents));
    if (combined.kind === 'number') {
      coefficient = coefficient.mul(combined.value);
    } else {
      if (combined.kind === 'mul') reflatten = true;
      rebuilt.push(combined);
    }
  }

  if (reflatten) {
    return mul(num(coefficient), ...rebuilt);
  }
  if (coefficient.isZero()) return ZERO;
  if (rebuilt.length === 0) return num(coefficient);

  // A bare number times a single sum distributes: 2*(x + 1) -> 2*x + 2
  if (!coefficient.isOne() && rebuilt.length === 1 && rebuilt[0].kind === 'add') {
    return add(...rebuilt[0].terms.map(t => mul(num(coefficient), t)));
  }

  rebuilt.sort(compareFactors);
  if (coefficient.isOne()) {
    return rebuilt.length === 1 ? rebuilt[0] : { kind: 'mul', factors: rebuilt };
  }
  return { kind: 'mul', factors: [num(coefficient), ...rebuilt] };
}

function bitLength(value: bigint): number {
  return value === 0n ? 0 : (value < 0n ? -value : value).toString(2).length;
}

function checkPowerSize(base: Rational, exponent: bigint): void {
  if (base.abs().isOne()) return;
  const magnitude = exponent < 0n ? -exponent : exponent;
  const bits = BigInt(Math.max(bitLength(base.num), bitLength(base.den)) - 1) * magnitude;
  if (bits > BigInt(MAX_POWER_BITS)) {
    throw new AlgebraInputError(`Numeric power too large to evaluate: ${base.toString()}**${exponent.toString()}`);
  }
}

export function pow(base: Expression, exponent: Expression): Expression {
  if (exponent.kind === 'number') {
    if (exponent.value.isZero()) return ONE;
    if (exponent.value.isOne()) return base;
  }

  if (base.kind === 'number') {
    const b = base.value;
    if (b.isOne()) return ONE;
    if (exponent.kind === 'number') {
      const r = exponent.value;
      if (b.isZero()) {
        if (r.isNegative()) throw new AlgebraError('Division by zero');
        return ZERO;
      }
      if (r.isInteger()) {
        checkPowerSize(b, r.num);
        return num(b.pow(r.num));
      }
      if (!b.isNegative() && r.den <= BigInt(MAX_EXACT_ROOT)) {
        const root = b.root(Number(r.den));
        if (root !== undefined) {
          checkPowerSize(root, r.num);
          return num(root.pow(r.num));
        }
      }
    }
    return { kind: 'pow', base, exponent };
  }

  if (base.kind === 'symbol' && base.name === 'E') {
    return call('exp', [exponent]);
  }

  const integerExponent = exponent.kind === 'number' && exponent.value.isInteger();
  if (integerExponent) {
    if (base.kind === 'pow') {
      return pow(base.base, mul(base.exponent, exponent));
    }
    if (base.kind === 'mul') {
      return mul(...base.factors.map(f => pow(f, exponent)));
    }
    if (base.kind === 'call' && base.name === 'exp' && base.args.length === 1) {
      return call('exp', [mul(base.args[0], exponent)]);
    }
  }

  return { kind: 'pow', base, exponent };
}

const ODD_FUNCTIONS = new Set(['sin', 'tan', 'asin', 'atan', 'sinh', 'tanh', 'asinh', 'atanh', 'erf']);
const EVEN_FUNCTIONS = new Set(['cos', 'cosh']);

/**
 * Function application with the trivial evaluations applied: sin(0) = 0, log(1) = 0, exp(log(u)) = u, ...
 */
export function call(name: string, args: readonly Expression[]): Expression {
  if (args.length !== 1) {
    return { kind: 'call', name, args };
  }
  const arg = args[0];
  const argValue = arg.kind === 'number' ? arg.value : undefined;

  if (ODD_FUNCTIONS.has(name)) {
    if (argValue?.isZero()) return ZERO;
    if (isNegativeTerm(arg)) return neg(call(name, [neg(arg)]));
  }
  if (EVEN_FUNCTIONS.has(name)) {
    if (argValue?.isZero()) return ONE;
    if (isNegativeTerm(arg)) return call(name, [neg(arg)]);
  }

  switch (name) {
    case 'exp':
      if (argValue?.isZero()) return ONE;
      if (arg.kind === 'call' && arg.name === 'log' && arg.args.length === 1) return arg.args[0];
      break;
    case 'log':
      if (argValue?.isOne()) return ZERO;
      if (arg.kind === 'symbol' && arg.name === 'E') return ONE;
      break;
    case 'acos':
      if (argValue?.isOne()) return ZERO;
      break;
    case 'Abs':
      if (argValue) return num(argValue.abs());
      break;
    case 'sign':
      if (argValue) return num(argValue.sign());
      break;
    case 'floor':
      if (argValue) return num(argValue.floor());
      break;
    case 'ceiling':
      if (argValue) return num(argValue.ceil());
      break;
    case 'gamma':
      if (argValue && argValue.isInteger() && argValue.num > 0n && argValue.num <= 20n) {
        let factorial = 1n;
        for (let k = 2n; k < argValue.num; k++) factorial *= k;
        return num(factorial);
      }
      break;
  }

  return { kind: 'call', name, args };
}

export function neg(expr: Expression): Expression {
  return mul(MINUS_ONE, expr);
}

export function sub(left: Expression, right: Expression): Expression {
  return add(left, neg(right));
}

export function div(numerator: Expression, denominator: Expression): Expression {
  return mul(numerator, pow(denominator, MINUS_ONE));
}

/**
 * Numeric coefficient times a term, without distributing over a sum.
 * Used where a factored form must survive, e.g. `2*(x + 1)`.
 */
export function keepCoefficient(coefficient: Rational, rest: Expression): Expression {
  if (coefficient.isZero()) return ZERO;
  if (coefficient.isOne()) return rest;
  if (rest.kind === 'number') return num(coefficient.mul(rest.value));
  if (rest.kind === 'mul') {
    const [first, ...others] = rest.factors;
    if (first !== undefined && first.kind === 'number') {
      return keepCoefficient(coefficient.mul(first.value), others.length === 1 ? others[0] : { kind: 'mul', factors: others });
    }
    return { kind: 'mul', factors: [num(coefficient), ...rest.factors] };
  }
  return { kind: 'mul', factors: [num(coefficient), rest] };
}

/**
 * Split a term into its numeric coefficient and the remaining product
 */
export function splitCoefficient(term: Expression): [Rational, Expression] {
  if (term.kind === 'number') return [term.value, ONE];
  if (term.kind === 'mul') {
    const [first, ...rest] = term.factors;
    if (first !== undefined && first.kind === 'number') {
      return [first.value, rest.length === 1 ? rest[0] : { kind: 'mul', factors: rest }];
    }
  }
  return [Rational.ONE, term];
}

function flattenTerms(terms: readonly Expression[]): Expression[] {
  const out: Expression[] = [];
  for (const term of terms) {
    if (term.kind === 'add') out.push(...term.terms);
    else out.push(term);
  }
  return out;
}

function flattenFactors(factors: readonly Expression[]): Expression[] {
  const out: Expression[] = [];
  for (const factor of factors) {
    if (factor.kind === 'mul') out.push(...factor.factors);
    else out.push(factor);
  }
  return out;
}

/**
 * Polynomial degree of a term in its variable symbols, ignoring coefficients
 */
export function termDegree(term: Expression): number {
  const factors = term.kind === 'mul' ? term.factors : [term];
  let degree = 0;
  for (const factor of factors) {
    if (factor.kind === 'symbol' && !CONSTANT_SYMBOLS.has(factor.name)) {
      degree += 1;
    } else if (
      factor.kind === 'pow' &&
      factor.base.kind === 'symbol' &&
      !CONSTANT_SYMBOLS.has(factor.base.name) &&
      factor.exponent.kind === 'number' &&
      factor.exponent.value.isInteger()
    ) {
      degree += Number(factor.exponent.value.num);
    }
  }
  return degree;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sum ordering: higher degree first, then alphabetical, numeric constant last
 */
function compareTerms(a: Expression, b: Expression): number {
  const aConst = a.kind === 'number';
  const bConst = b.kind === 'number';
  if (aConst !== bConst) return aConst ? 1 : -1;

  const byDegree = termDegree(b) - termDegree(a);
  if (byDegree !== 0) return byDegree;

  const byRest = compareStrings(printKey(splitCoefficient(a)[1]), printKey(splitCoefficient(b)[1]));
  if (byRest !== 0) return byRest;
  return compareStrings(printKey(a), printKey(b));
}

function factorRank(expr: Expression): number {
  const base = expr.kind === 'pow' ? expr.base : expr;
  switch (base.kind) {
    case 'number':
      return 0;
    case 'symbol':
      return 1;
    case 'call':
      return 2;
    case 'hole':
      return 4;
    default:
      return 3;
  }
}

/**
 * Product ordering: numeric-base powers, symbols, function calls, compound bases, placeholders
 */
function compareFactors(a: Expression, b: Expression): number {
  const byRank = factorRank(a) - factorRank(b);
  if (byRank !== 0) return byRank;

  const aBase = a.kind === 'pow' ? a.base : a;
  const bBase = b.kind === 'pow' ? b.base : b;
  const byBase = compareStrings(printKey(aBase), printKey(bBase));
  if (byBase !== 0) return byBase;

  const aExp = a.kind === 'pow' ? a.exponent : ONE;
  const bExp = b.kind === 'pow' ? b.exponent : ONE;
  return compareStrings(printKey(aExp), printKey(bExp));
}
