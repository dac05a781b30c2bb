/**
 * Symbolic antiderivatives.
 * Linearity, the power rule, the table of elementary integrals with a linear inner
 * argument (u = a*x + b), and integration by parts for a polynomial times exp, sin, cos,
 * sinh, cosh or log. Anything else raises UnsupportedError. No constant of integration is added.
 */

import { CallNode, Expression, MulNode, ONE, PowNode, num, sym } from './AST.js';
import { add, mul, pow, call, neg, sub, div } from './Canonical.js';
import { differentiate } from './Differentiate.js';
import { UnsupportedError } from './Errors.js';
import { expand } from './Expand.js';
import { bottomUp, dependsOn, equals } from './Inspect.js';
import { toPolynomial } from './Polynomial.js';
import { print } from './Printer.js';
import { Rational } from './Rational.js';

/**
 * du/dx when u is linear in the variable, otherwise undefined
 */
function linearSlope(u: Expression, variable: string): Expression | undefined {
  const slope = differentiate(u, variable);
  if (dependsOn(slope, variable)) return undefined;
  if (slope.kind === 'number' && slope.value.isZero()) return undefined;
  return slope;
}

/**
 * ∫ f(u) du for the functions with a table entry
 */
function tableIntegral(name: string, u: Expression): Expression | undefined {
  switch (name) {
    case 'sin':
      return neg(call('cos', [u]));
    case 'cos':
      return call('sin', [u]);
    case 'tan':
      return neg(call('log', [call('cos', [u])]));
    case 'exp':
      return call('exp', [u]);
    case 'log':
      return sub(mul(u, call('log', [u])), u);
    case 'sinh':
      return call('cosh', [u]);
    case 'cosh':
      return call('sinh', [u]);
    default:
      return undefined;
  }
}

function unsupported(expr: Expression): UnsupportedError {
  return new UnsupportedError('No antiderivative known for expression', print(expr));
}

function integrateCall(expr: CallNode, variable: string): Expression {
  if (expr.args.length !== 1) throw unsupported(expr);
  const u = expr.args[0];
  const slope = linearSlope(u, variable);
  if (slope === undefined) throw unsupported(expr);
  const antiderivative = tableIntegral(expr.name, u);
  if (antiderivative === undefined) throw unsupported(expr);
  return div(antiderivative, slope);
}

function integratePower(expr: PowNode, variable: string): Expression {
  const { base, exponent } = expr;
  const x = sym(variable);

  if (!dependsOn(exponent, variable)) {
    const slope = linearSlope(base, variable);
    if (slope !== undefined) {
      // ∫ u^n = u^(n+1)/(n+1), ∫ u^-1 = log(u)
      if (exponent.kind === 'number' && exponent.value.equals(Rational.MINUS_ONE)) {
        return div(call('log', [base]), slope);
      }
      const raised = add(exponent, ONE);
      return div(pow(base, raised), mul(raised, slope));
    }

    if (exponent.kind === 'number') {
      const n = exponent.value;
      if (n.equals(Rational.MINUS_ONE) && equals(base, add(pow(x, num(2)), ONE))) {
        return call('atan', [x]);
      }
      if (n.equals(Rational.of(-1, 2)) && equals(base, sub(ONE, pow(x, num(2))))) {
        return call('asin', [x]);
      }
      // sec(u)**2 and cos(u)**-2 integrate to tan(u)
      if (
        base.kind === 'call' &&
        base.args.length === 1 &&
        ((base.name === 'sec' && n.equals(Rational.of(2))) || (base.name === 'cos' && n.equals(Rational.of(-2))))
      ) {
        const slope = linearSlope(base.args[0], variable);
        if (slope !== undefined) return div(call('tan', [base.args[0]]), slope);
      }
    }
  }

  if (!dependsOn(base, variable)) {
    // ∫ a^u = a^u/(u'·log(a))
    const slope = linearSlope(exponent, variable);
    if (slope !== undefined) return div(expr, mul(slope, call('log', [base])));
  }

  const expanded = expand(expr);
  if (!equals(expanded, expr)) return integrate(expanded, variable);
  throw unsupported(expr);
}

const BY_PARTS_FUNCTIONS = new Set(['exp', 'sin', 'cos', 'sinh', 'cosh']);

/**
 * ∫ p·g for a polynomial p: differentiate p when g integrates in the table,
 * integrate p when g is a logarithm
 */
function integrateByParts(factors: readonly Expression[], variable: string): Expression | undefined {
  if (factors.length !== 2) return undefined;

  for (const [p, g] of [[factors[0], factors[1]], [factors[1], factors[0]]]) {
    if (toPolynomial(p, variable) === undefined) continue;
    if (g.kind !== 'call' || g.args.length !== 1 || linearSlope(g.args[0], variable) === undefined) continue;

    if (BY_PARTS_FUNCTIONS.has(g.name)) {
      const G = integrate(g, variable);
      return sub(mul(p, G), integrate(mul(differentiate(p, variable), G), variable));
    }
    if (g.name === 'log') {
      const P = integrate(p, variable);
      return sub(mul(P, g), integrate(mul(P, differentiate(g, variable)), variable));
    }
  }
  return undefined;
}

function integrateProduct(expr: MulNode, variable: string): Expression {
  const constants = expr.factors.filter(f => !dependsOn(f, variable));
  const varying = expr.factors.filter(f => dependsOn(f, variable));

  if (constants.length > 0) {
    return mul(...constants, integrate(mul(...varying), variable));
  }

  const byParts = integrateByParts(varying, variable);
  if (byParts !== undefined) return byParts;

  const expanded = expand(expr);
  if (!equals(expanded, expr)) return integrate(expanded, variable);
  throw unsupported(expr);
}

/**
 * An antiderivative of `expr` with respect to `variable`
 */
export function integrate(expr: Expression, variable: string): Expression {
  if (!dependsOn(expr, variable)) {
    return mul(expr, sym(variable));
  }

  switch (expr.kind) {
    case 'symbol':
      return div(pow(expr, num(2)), num(2));
    case 'add':
      return add(...expr.terms.map(t => integrate(t, variable)));
    case 'mul':
      return integrateProduct(expr, variable);
    case 'pow':
      return integratePower(expr, variable);
    case 'call':
      return integrateCall(expr, variable);
    case 'number':
    case 'hole':
      throw unsupported(expr);
  }
}

export function substitute(expr: Expression, variable: string, value: Expression): Expression {
  return bottomUp(expr, node => (node.kind === 'symbol' && node.name === variable ? value : node));
}

/**
 * F(upper) - F(lower) for an antiderivative F
 */
export function definiteIntegral(expr: Expression, variable: string, lower: Expression, upper: Expression): Expression {
  const antiderivative = integrate(expr, variable);
  return sub(substitute(antiderivative, variable, upper), substitute(antiderivative, variable, lower));
}
