/**
 * Trigonometric and hyperbolic identities.
 *
 * Sums:     c*sin(u)**2 + c*cos(u)**2 -> c
 *           c*cosh(u)**2 - c*sinh(u)**2 -> c
 *           c*cos(u)**2 - c*sin(u)**2 -> c*cos(2*u)
 * Products: sin(u)**n * cos(u)**-n -> tan(u)**n
 *           2*sin(u)*cos(u) -> sin(2*u)
 */

import { Expression, ONE, num } from './AST.js';
import { add, mul, pow, call, splitCoefficient } from './Canonical.js';
import { bottomUp, equals } from './Inspect.js';
import { Rational } from './Rational.js';

const MAX_PASSES = 8;

interface SquarePair {
  first: string;
  second: string;
  sign: 1 | -1;
  result: (u: Expression) => Expression;
}

const SQUARE_PAIRS: readonly SquarePair[] = [
  { first: 'sin', second: 'cos', sign: 1, result: () => ONE },
  { first: 'cosh', second: 'sinh', sign: -1, result: () => ONE },
  { first: 'cos', second: 'sin', sign: -1, result: u => call('cos', [mul(num(2), u)]) }
];

export function trigSimplify(expr: Expression): Expression {
  let current = expr;
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = bottomUp(current, simplifyNode);
    if (equals(next, current)) return next;
    current = next;
  }
  return current;
}

function simplifyNode(node: Expression): Expression {
  if (node.kind === 'add') return simplifySum(node.terms);
  if (node.kind === 'mul') return simplifyProduct(node.factors);
  return node;
}

function simplifySum(terms: readonly Expression[]): Expression {
  let current = terms.slice();
  let changed = true;
  while (changed) {
    changed = false;
    for (const pair of SQUARE_PAIRS) {
      const combined = combineSquares(current, pair);
      if (combined) {
        current = combined;
        changed = true;
        break;
      }
    }
  }
  return add(...current);
}

/**
 * Find c*R*f(u)**2 and sign*c*R*g(u)**2 among the terms and replace both with c*R*result(u)
 */
function combineSquares(terms: Expression[], pair: SquarePair): Expression[] | undefined {
  for (let i = 0; i < terms.length; i++) {
    const [coefficient, rest] = splitCoefficient(terms[i]);
    const factors = rest.kind === 'mul' ? rest.factors : [rest];

    for (let k = 0; k < factors.length; k++) {
      const u = squaredArgument(factors[k], pair.first);
      if (u === undefined) continue;

      const others = factors.filter((_, idx) => idx !== k);
      const partner = mul(num(coefficient.mul(Rational.of(pair.sign))), ...others, pow(call(pair.second, [u]), num(2)));
      const j = terms.findIndex((t, idx) => idx !== i && equals(t, partner));
      if (j < 0) continue;

      const replacement = mul(num(coefficient), ...others, pair.result(u));
      return [...terms.filter((_, idx) => idx !== i && idx !== j), replacement];
    }
  }
  return undefined;
}

function squaredArgument(factor: Expression, name: string): Expression | undefined {
  if (
    factor.kind === 'pow' &&
    factor.base.kind === 'call' &&
    factor.base.name === name &&
    factor.base.args.length === 1 &&
    factor.exponent.kind === 'number' &&
    factor.exponent.value.equals(Rational.of(2))
  ) {
    return factor.base.args[0];
  }
  return undefined;
}

interface TrigPower {
  index: number;
  argument: Expression;
  exponent: Rational;
}

function findPowers(factors: readonly Expression[], name: string): TrigPower[] {
  const out: TrigPower[] = [];
  factors.forEach((factor, index) => {
    const base = factor.kind === 'pow' ? factor.base : factor;
    const exponent = factor.kind === 'pow' ? factor.exponent : ONE;
    if (base.kind === 'call' && base.name === name && base.args.length === 1 && exponent.kind === 'number') {
      out.push({ index, argument: base.args[0], exponent: exponent.value });
    }
  });
  return out;
}

function simplifyProduct(factors: readonly Expression[]): Expression {
  const sines = findPowers(factors, 'sin');
  const cosines = findPowers(factors, 'cos');

  for (const s of sines) {
    for (const c of cosines) {
      if (!equals(s.argument, c.argument)) continue;
      const others = factors.filter((_, idx) => idx !== s.index && idx !== c.index);

      if (s.exponent.add(c.exponent).isZero()) {
        return mul(...others, pow(call('tan', [s.argument]), num(s.exponent)));
      }

      const [coefficient] = splitCoefficient(mul(...factors));
      if (s.exponent.isOne() && c.exponent.isOne() && coefficient.isInteger() && coefficient.num % 2n === 0n) {
        return mul(...others, num(Rational.of(1n, 2n)), call('sin', [mul(num(2), s.argument)]));
      }
    }
  }

  return mul(...factors);
}
