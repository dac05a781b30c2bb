/**
 * Polynomial expansion: distribute products over sums and multiply out integer powers of sums.
 */

import { Expression, MINUS_ONE, ONE, integerValue } from './AST.js';
import { add, mul, pow } from './Canonical.js';
import { bottomUp } from './Inspect.js';

/** Powers of sums above this are left unexpanded */
const MAX_EXPANDED_POWER = 32;

export function expand(expr: Expression): Expression {
  return bottomUp(expr, expandNode);
}

function expandNode(node: Expression): Expression {
  if (node.kind === 'mul') {
    return distribute(node.factors);
  }
  if (node.kind === 'pow' && node.base.kind === 'add') {
    const n = integerValue(node.exponent);
    if (n === undefined || n === 0n) return node;
    const magnitude = n < 0n ? -n : n;
    if (magnitude > BigInt(MAX_EXPANDED_POWER)) return node;

    const repeated: Expression[] = [];
    for (let i = 0n; i < magnitude; i++) repeated.push(node.base);
    const expanded = distribute(repeated);
    return n < 0n ? pow(expanded, MINUS_ONE) : expanded;
  }
  return node;
}

/**
 * Multiply factors out term by term: (a + b)*(c + d) = a*c + a*d + b*c + b*d
 */
function distribute(factors: readonly Expression[]): Expression {
  let terms: Expression[] = [ONE];
  for (const factor of factors) {
    const parts = factor.kind === 'add' ? factor.terms : [factor];
    const next: Expression[] = [];
    for (const left of terms) {
      for (const right of parts) {
        next.push(mul(left, right));
      }
    }
    terms = next;
  }
  return add(...terms);
}
