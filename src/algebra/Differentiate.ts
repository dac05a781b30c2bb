/**
 * Symbolic differentiation.
 * `outerDerivative` is the table of f'(u) for single-argument functions; `differentiate`
 * applies sum, product, power and chain rules recursively in one pass.
 */

import { Expression, HALF, MINUS_ONE, ONE, PI, ZERO, num } from './AST.js';
import { add, mul, pow, call, neg, sub, div } from './Canonical.js';
import { UnsupportedError } from './Errors.js';
import { dependsOn } from './Inspect.js';

const TWO = num(2);

function square(u: Expression): Expression {
  return pow(u, TWO);
}

function inverseSqrt(u: Expression): Expression {
  return pow(u, neg(HALF));
}

/**
 * d/du f(u) for the functions the backend knows, or undefined
 */
export function outerDerivative(name: string, u: Expression): Expression | undefined {
  switch (name) {
    case 'sin':
      return call('cos', [u]);
    case 'cos':
      return neg(call('sin', [u]));
    case 'tan':
      return add(square(call('tan', [u])), ONE);
    case 'sec':
      return mul(call('sec', [u]), call('tan', [u]));
    case 'csc':
      return neg(mul(call('cot', [u]), call('csc', [u])));
    case 'cot':
      return sub(MINUS_ONE, square(call('cot', [u])));
    case 'exp':
      return call('exp', [u]);
    case 'log':
      return pow(u, MINUS_ONE);
    case 'asin':
      return inverseSqrt(sub(ONE, square(u)));
    case 'acos':
      return neg(inverseSqrt(sub(ONE, square(u))));
    case 'atan':
      return pow(add(square(u), ONE), MINUS_ONE);
    case 'asec':
      return mul(pow(u, num(-2)), inverseSqrt(sub(ONE, pow(u, num(-2)))));
    case 'acsc':
      return neg(mul(pow(u, num(-2)), inverseSqrt(sub(ONE, pow(u, num(-2))))));
    case 'acot':
      return neg(pow(add(square(u), ONE), MINUS_ONE));
    case 'sinh':
      return call('cosh', [u]);
    case 'cosh':
      return call('sinh', [u]);
    case 'tanh':
      return sub(ONE, square(call('tanh', [u])));
    case 'asinh':
      return inverseSqrt(add(square(u), ONE));
    case 'acosh':
      return inverseSqrt(sub(square(u), ONE));
    case 'atanh':
      return pow(sub(ONE, square(u)), MINUS_ONE);
    case 'erf':
      return mul(TWO, pow(PI, neg(HALF)), call('exp', [neg(square(u))]));
    case 'gamma':
      return mul(call('gamma', [u]), call('polygamma', [ZERO, u]));
    case 'Heaviside':
      return call('DiracDelta', [u]);
    case 'DiracDelta':
      return call('DiracDelta', [u, ONE]);
    case 'Abs':
      return call('sign', [u]);
    case 'floor':
    case 'ceiling':
    case 'sign':
      return ZERO;
    default:
      return undefined;
  }
}

export function differentiate(expr: Expression, variable: string): Expression {
  if (!dependsOn(expr, variable)) {
    return ZERO;
  }

  switch (expr.kind) {
    case 'number':
    case 'hole':
      return ZERO;

    case 'symbol':
      return expr.name === variable ? ONE : ZERO;

    case 'add':
      return add(...expr.terms.map(t => differentiate(t, variable)));

    case 'mul': {
      // d(f1*f2*...*fn) = sum_i f1*...*fi'*...*fn
      const terms = expr.factors.map((factor, i) => {
        const others = expr.factors.filter((_, j) => j !== i);
        return mul(differentiate(factor, variable), ...others);
      });
      return add(...terms);
    }

    case 'pow': {
      const { base, exponent } = expr;
      const baseVaries = dependsOn(base, variable);
      const exponentVaries = dependsOn(exponent, variable);

      if (!exponentVaries) {
        // d(u^n) = n * u^(n-1) * u'
        return mul(exponent, pow(base, sub(exponent, ONE)), differentiate(base, variable));
      }
      if (!baseVaries) {
        // d(a^v) = a^v * ln(a) * v'
        return mul(expr, call('log', [base]), differentiate(exponent, variable));
      }
      // d(u^v) = u^v * (v' * ln(u) + v * u' / u)
      return mul(
        expr,
        add(
          mul(differentiate(exponent, variable), call('log', [base])),
          div(mul(exponent, differentiate(base, variable)), base)
        )
      );
    }

    case 'call': {
      if (expr.args.length !== 1) {
        return differentiateIndexed(expr.name, expr.args, variable);
      }
      const inner = expr.args[0];
      const outer = outerDerivative(expr.name, inner);
      if (outer === undefined) {
        throw new UnsupportedError('No derivative known for function', expr.name);
      }
      return mul(outer, differentiate(inner, variable));
    }
  }
}

/**
 * Functions carrying a constant order besides their argument: polygamma(n, u) and DiracDelta(u, k)
 */
function differentiateIndexed(name: string, args: readonly Expression[], variable: string): Expression {
  let order: Expression;
  let inner: Expression;
  if (name === 'polygamma' && args.length === 2) {
    [order, inner] = args;
  } else if (name === 'DiracDelta' && args.length === 2) {
    [inner, order] = args;
  } else {
    throw new UnsupportedError('Cannot differentiate multi-argument function', name);
  }
  if (dependsOn(order, variable)) {
    throw new UnsupportedError('Cannot differentiate with respect to the order of function', name);
  }

  const next = add(order, ONE);
  const outer = name === 'polygamma' ? call(name, [next, inner]) : call(name, [inner, next]);
  return mul(outer, differentiate(inner, variable));
}

/**
 * n-th derivative, n >= 0
 */
export function nthDerivative(expr: Expression, variable: string, order: number): Expression {
  let current = expr;
  for (let i = 0; i < order; i++) {
    current = differentiate(current, variable);
  }
  return current;
}
