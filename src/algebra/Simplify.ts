/**
 * General simplification.
 * Tries trig identities, expansion and cancellation of common polynomial factors in quotients,
 * keeps whichever candidate has the fewest nodes, and repeats until nothing gets smaller.
 */

import { Expression, MINUS_ONE, num } from './AST.js';
import { mul, pow } from './Canonical.js';
import { expand } from './Expand.js';
import { factor } from './Factor.js';
import { bottomUp, equals, size } from './Inspect.js';
import { trigSimplify } from './Trig.js';

const MAX_PASSES = 8;

export function simplify(expr: Expression): Expression {
  let current = expr;

  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const expanded = expand(current);
    const candidates = [trigSimplify(current), expanded, trigSimplify(expanded), cancelCommonFactors(current)];

    let best = current;
    for (const candidate of candidates) {
      if (size(candidate) < size(best)) best = candidate;
    }

    if (equals(best, current)) break;
    current = best;
  }

  return current;
}

/**
 * The positive power a factor divides by, e.g. `(x - 1)**-2` -> `(x - 1)**2`
 */
function denominatorOf(part: Expression): Expression | undefined {
  if (part.kind !== 'pow' || part.exponent.kind !== 'number') return undefined;
  const exponent = part.exponent.value;
  if (!exponent.isNegative() || !exponent.isInteger()) return undefined;
  return pow(part.base, num(exponent.neg()));
}

function splitQuotient(expr: Expression): [Expression[], Expression[]] {
  const numerator: Expression[] = [];
  const denominator: Expression[] = [];
  for (const part of expr.kind === 'mul' ? expr.factors : [expr]) {
    const divisor = denominatorOf(part);
    if (divisor === undefined) numerator.push(part);
    else denominator.push(divisor);
  }
  return [numerator, denominator];
}

function cancelQuotient(expr: Expression): Expression {
  const [numerator, denominator] = splitQuotient(expr);
  if (denominator.length === 0) return expr;

  // Factored bases that match print identically, so the product collects them to exponent 0
  const factored = mul(...numerator.map(factor), pow(mul(...denominator.map(factor)), MINUS_ONE));
  const [top, bottom] = splitQuotient(factored);
  const before = expand(mul(...denominator));
  const after = expand(mul(...bottom));
  if (equals(before, after)) return expr;

  return mul(expand(mul(...top)), pow(after, MINUS_ONE));
}

/**
 * Cancels polynomial factors shared by the numerator and denominator of every quotient,
 * e.g. `(x**2 - 1)/(x - 1)` -> `x + 1`. Quotients with nothing in common are returned unchanged.
 */
export function cancelCommonFactors(expr: Expression): Expression {
  return bottomUp(expr, cancelQuotient);
}
