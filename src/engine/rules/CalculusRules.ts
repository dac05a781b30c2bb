/**
 * Differentiation rules
 *
 * Each rule resolves the first pending derivative (in preorder) that fits its
 * pattern, opening new pending derivatives for the inner parts. Pattern rules
 * only handle first-order derivatives; higher orders go through
 * expand_higher_order. The fallback evaluates any remaining derivative directly.
 */

import { Expression, MINUS_ONE, ONE, ZERO, num } from '../../algebra/AST.js';
import { add, call, mul, pow, sub } from '../../algebra/Canonical.js';
import { nthDerivative, outerDerivative } from '../../algebra/Differentiate.js';
import { dependsOn, equals } from '../../algebra/Inspect.js';
import { print } from '../../algebra/Printer.js';
import { simplify as simplifyExpression } from '../../algebra/Simplify.js';
import { trigSimplify } from '../../algebra/Trig.js';
import {
  Goal,
  OpenDerivative,
  PendingDerivative,
  findPending,
  isResolved,
  replaceExpression,
  resolvePending
} from '../Goal.js';
import type { Metadata } from '../Models.js';
import { PluginManifest, RewriteRule, RuleResult, defineRewriteRule, explanations } from '../Rule.js';

export const CALCULUS_MANIFEST: PluginManifest = {
  name: 'stepwise-calculus',
  version: '0.1.0',
  description: 'Step-by-step differentiation rules'
};

const BACKEND_MANIFEST: PluginManifest = {
  name: 'stepwise-backend',
  version: '0.1.0',
  description: 'Rules that delegate to the algebra backend'
};

interface DerivativeRuleDefinition {
  name: string;
  priority: number;
  /** Which pending derivative the rule handles */
  target: (d: PendingDerivative) => boolean;
  replace: (d: PendingDerivative, open: OpenDerivative) => Expression;
  explanation: (d: PendingDerivative) => string;
  teacher: (d: PendingDerivative) => string;
  /** Only first-order derivatives (default: true) */
  firstOrderOnly?: boolean;
  manifest?: PluginManifest;
  metadata?: Metadata;
}

function derivativeRule(def: DerivativeRuleDefinition): RewriteRule {
  const { firstOrderOnly = true, manifest = CALCULUS_MANIFEST } = def;
  const predicate = (d: PendingDerivative): boolean => (!firstOrderOnly || d.order === 1) && def.target(d);

  return defineRewriteRule({
    name: def.name,
    operation: 'differentiate',
    priority: def.priority,
    domains: ['calculus'],
    manifest,
    matches: goal => findPending(goal, predicate) !== undefined,
    apply: (goal): RuleResult<Goal> => {
      const match = findPending(goal, predicate);
      if (!match) {
        return { output: goal, explanation: 'No matching derivative.', metadata: { noop: true } };
      }
      const { derivative } = match;
      const explanation = def.explanation(derivative);
      return {
        output: resolvePending(goal, match.id, open => def.replace(derivative, open)),
        explanation,
        metadata: explanations(explanation, def.teacher(derivative), def.metadata)
      };
    }
  });
}

function factorsOf(expr: Expression): readonly Expression[] {
  return expr.kind === 'mul' ? expr.factors : [expr];
}

const ORDER_NAMES: Record<number, string> = { 2: 'second', 3: 'third', 4: 'fourth', 5: 'fifth' };
const SUPERSCRIPTS: Record<number, string> = { 2: '²', 3: '³', 4: '⁴', 5: '⁵' };

function orderName(order: number): string {
  return ORDER_NAMES[order] ?? `${order}th`;
}

function orderNotation(order: number, variable: string): string {
  const sup = SUPERSCRIPTS[order];
  return sup ? `d${sup}/d${variable}${sup}` : `d^${order}/d${variable}^${order}`;
}

export const expandHigherOrder = derivativeRule({
  name: 'expand_higher_order',
  priority: 150,
  firstOrderOnly: false,
  target: d => d.order > 1 && dependsOn(d.operand, d.variable),
  // nested derivatives collapse, so the n-th derivative is evaluated in one step
  replace: d => nthDerivative(d.operand, d.variable, d.order),
  explanation: d =>
    `Compute ${orderName(d.order)} derivative: ${orderNotation(d.order, d.variable)}[${print(d.operand)}]`,
  teacher: d =>
    `The ${orderName(d.order)} derivative ${orderNotation(d.order, d.variable)} means differentiating ${d.order} times ` +
    `with respect to ${d.variable}. For polynomials, each differentiation reduces the degree by 1 and multiplies by the current power.`
});

export const diffConstant = derivativeRule({
  name: 'diff_constant',
  priority: 100,
  firstOrderOnly: false,
  target: d => !dependsOn(d.operand, d.variable),
  replace: () => ZERO,
  explanation: () => 'Derivative of a constant is 0.',
  teacher: () =>
    "If a term does not depend on the variable, changing it cannot change the term's value, so the rate of change is 0."
});

export const diffIdentity = derivativeRule({
  name: 'diff_identity',
  priority: 100,
  target: d => d.operand.kind === 'symbol' && d.operand.name === d.variable,
  replace: () => ONE,
  explanation: d => `Derivative of ${d.variable} with respect to ${d.variable} is 1.`,
  teacher: d => `The function f(${d.variable})=${d.variable} increases by 1 for every +1 in ${d.variable}, so its slope is 1.`
});

export const sumRule = derivativeRule({
  name: 'sum_rule',
  priority: 90,
  target: d => d.operand.kind === 'add',
  replace: (d, open) => add(...(d.operand.kind === 'add' ? d.operand.terms : [d.operand]).map(t => open(t, d.variable))),
  explanation: () => "Differentiate term-by-term using linearity: d/dx(f+g)=f'+g'.",
  teacher: () => 'Linearity means we can differentiate each term separately and then add the results.'
});

export const constantMultiple = derivativeRule({
  name: 'constant_multiple',
  priority: 95,
  target: d => d.operand.kind === 'mul' && d.operand.factors.some(f => !dependsOn(f, d.variable)),
  replace: (d, open) => {
    const factors = factorsOf(d.operand);
    const constants = factors.filter(f => !dependsOn(f, d.variable));
    const varying = factors.filter(f => dependsOn(f, d.variable));
    return mul(...constants, open(mul(...varying), d.variable));
  },
  explanation: () => "Factor out constants: d/dx(c·u)=c·u'.",
  teacher: d => `Constants don't change with ${d.variable}, so they factor out of the derivative.`
});

/**
 * Factor of the form g**-1 with g depending on the variable
 */
function reciprocalIndex(d: PendingDerivative): number {
  return factorsOf(d.operand).findIndex(
    f =>
      f.kind === 'pow' &&
      f.exponent.kind === 'number' &&
      f.exponent.value.equals(MINUS_ONE.value) &&
      dependsOn(f.base, d.variable)
  );
}

export const quotientRule = derivativeRule({
  name: 'quotient_rule',
  priority: 80,
  target: d => d.operand.kind === 'mul' && reciprocalIndex(d) >= 0,
  replace: (d, open) => {
    const factors = factorsOf(d.operand);
    const index = reciprocalIndex(d);
    const reciprocal = factors[index];
    const g = reciprocal.kind === 'pow' ? reciprocal.base : reciprocal;
    const f = mul(...factors.filter((_, i) => i !== index));
    // (f'·g - f·g') / g²
    return mul(sub(mul(open(f, d.variable), g), mul(f, open(g, d.variable))), pow(g, num(-2)));
  },
  explanation: () => "Apply quotient rule: d/dx(f/g) = (f'·g - f·g') / g².",
  teacher: () =>
    'When dividing functions, use the quotient rule: derivative of numerator times denominator minus numerator times derivative of denominator, all over denominator squared.'
});

export const powerRule = derivativeRule({
  name: 'power_rule',
  priority: 85,
  target: d => d.operand.kind === 'pow' && !dependsOn(d.operand.exponent, d.variable),
  replace: (d, open) => {
    if (d.operand.kind !== 'pow') return open(d.operand, d.variable);
    const { base, exponent } = d.operand;
    return mul(exponent, pow(base, sub(exponent, ONE)), open(base, d.variable));
  },
  explanation: () => "Apply power rule with chain: d/dx(u^n)=n·u^(n-1)·u'.",
  teacher: d =>
    `If u depends on ${d.variable}, we differentiate u^n like the usual power rule, then multiply by u' to account for how u changes with ${d.variable}.`
});

export const exponentialRule = derivativeRule({
  name: 'exponential_rule',
  priority: 85,
  target: d =>
    d.operand.kind === 'pow' && dependsOn(d.operand.exponent, d.variable) && !dependsOn(d.operand.base, d.variable),
  replace: (d, open) => {
    if (d.operand.kind !== 'pow') return open(d.operand, d.variable);
    const { base, exponent } = d.operand;
    return mul(d.operand, call('log', [base]), open(exponent, d.variable));
  },
  explanation: () => "Apply exponential rule: d/dx(a^u)=a^u·ln(a)·u'.",
  teacher: () =>
    'A constant base raised to a varying power changes in proportion to itself; the factor ln(a) converts the growth rate to base e.'
});

export const productRule = derivativeRule({
  name: 'product_rule',
  priority: 80,
  target: d => d.operand.kind === 'mul' && d.operand.factors.length >= 2,
  replace: (d, open) => {
    const [first, ...others] = factorsOf(d.operand);
    const rest = mul(...others);
    return add(mul(first, open(rest, d.variable)), mul(rest, open(first, d.variable)));
  },
  explanation: () => "Apply product rule: d/dx(f·g)=f·g' + g·f'.",
  teacher: () =>
    'Think of f·g as one quantity times another. If either changes, the product changes; the product rule accounts for both contributions.'
});

export const logarithmicDifferentiation = derivativeRule({
  name: 'logarithmic_differentiation',
  priority: 80,
  target: d =>
    d.operand.kind === 'pow' && dependsOn(d.operand.base, d.variable) && dependsOn(d.operand.exponent, d.variable),
  replace: (d, open) => {
    if (d.operand.kind !== 'pow') return open(d.operand, d.variable);
    const { base, exponent } = d.operand;
    return mul(
      d.operand,
      add(
        mul(call('log', [base]), open(exponent, d.variable)),
        mul(exponent, pow(base, MINUS_ONE), open(base, d.variable))
      )
    );
  },
  explanation: () => "Apply logarithmic differentiation: d/dx(u^v) = u^v·[ln(u)·v' + (v/u)·u'].",
  teacher: d =>
    `When both base and exponent depend on ${d.variable}, use logarithmic differentiation: take ln of both sides, differentiate, then solve for dy/d${d.variable}.`
});

interface ChainEntry {
  formula: string;
  teacher: string;
}

/**
 * Single-argument functions with a chain rule, keyed by function name
 */
const CHAIN_RULES: ReadonlyArray<[string, ChainEntry]> = [
  ['sin', {
    formula: "Apply chain rule: d/dx(sin(u))=cos(u)·u'.",
    teacher: "Outer function: sin(·). Inner function: u. Differentiate the outer (cos) and multiply by the derivative of the inner (u')."
  }],
  ['cos', {
    formula: "Apply chain rule: d/dx(cos(u))=-sin(u)·u'.",
    teacher: 'Differentiate the outer (cos→-sin) and multiply by the inner derivative.'
  }],
  ['tan', {
    formula: "Apply chain rule: d/dx(tan(u))=sec(u)^2·u'.",
    teacher: 'Derivative of tan is sec^2; multiply by the inner derivative.'
  }],
  ['sec', {
    formula: "Apply chain rule: d/dx(sec(u))=sec(u)·tan(u)·u'.",
    teacher: 'Derivative of sec is sec·tan; multiply by the inner derivative.'
  }],
  ['csc', {
    formula: "Apply chain rule: d/dx(csc(u))=-csc(u)·cot(u)·u'.",
    teacher: 'Derivative of csc is -csc·cot; multiply by the inner derivative.'
  }],
  ['cot', {
    formula: "Apply chain rule: d/dx(cot(u))=-csc(u)^2·u'.",
    teacher: 'Derivative of cot is -csc^2; multiply by the inner derivative.'
  }],
  ['exp', {
    formula: "Apply chain rule: d/dx(e^u)=e^u·u'.",
    teacher: 'The derivative of e^u is itself times the inner derivative.'
  }],
  ['log', {
    formula: "Apply chain rule: d/dx(ln(u))=u'/u.",
    teacher: 'Differentiate log by dividing the inner derivative by the inner function.'
  }],
  ['asin', {
    formula: "Apply chain rule: d/dx(arcsin(u))=u'/sqrt(1-u^2).",
    teacher: 'Derivative of arcsin uses 1/sqrt(1-u^2); include inner derivative.'
  }],
  ['acos', {
    formula: "Apply chain rule: d/dx(arccos(u))=-u'/sqrt(1-u^2).",
    teacher: 'Derivative of arccos is -1/sqrt(1-u^2); include inner derivative.'
  }],
  ['atan', {
    formula: "Apply chain rule: d/dx(arctan(u))=u'/(1+u^2).",
    teacher: 'Derivative of arctan uses 1/(1+u^2); include inner derivative.'
  }],
  ['asec', {
    formula: "Apply chain rule: d/dx(arcsec(u))=u'/(|u|·√(u²-1)).",
    teacher: "Inverse secant differentiates to u' over (absolute value of u times sqrt(u²-1))."
  }],
  ['acsc', {
    formula: "Apply chain rule: d/dx(arccsc(u))=-u'/(|u|·√(u²-1)).",
    teacher: "Inverse cosecant differentiates to negative u' over (absolute value of u times sqrt(u²-1))."
  }],
  ['acot', {
    formula: "Apply chain rule: d/dx(arccot(u))=-u'/(1+u²).",
    teacher: "Inverse cotangent differentiates to negative u' over (1+u²)."
  }],
  ['sinh', {
    formula: "Apply chain rule: d/dx(sinh(u))=cosh(u)·u'.",
    teacher: 'Hyperbolic sine differentiates to hyperbolic cosine times the inner derivative.'
  }],
  ['cosh', {
    formula: "Apply chain rule: d/dx(cosh(u))=sinh(u)·u'.",
    teacher: 'Hyperbolic cosine differentiates to hyperbolic sine times the inner derivative.'
  }],
  ['tanh', {
    formula: "Apply chain rule: d/dx(tanh(u))=sech²(u)·u'.",
    teacher: 'Hyperbolic tangent differentiates to hyperbolic secant squared times the inner derivative.'
  }],
  ['asinh', {
    formula: "Apply chain rule: d/dx(asinh(u))=u'/sqrt(u²+1).",
    teacher: "Inverse hyperbolic sine differentiates to u' over sqrt(u²+1)."
  }],
  ['acosh', {
    formula: "Apply chain rule: d/dx(acosh(u))=u'/sqrt(u²-1).",
    teacher: "Inverse hyperbolic cosine differentiates to u' over sqrt(u²-1)."
  }],
  ['atanh', {
    formula: "Apply chain rule: d/dx(atanh(u))=u'/(1-u²).",
    teacher: "Inverse hyperbolic tangent differentiates to u' over (1-u²)."
  }],
  ['erf', {
    formula: "Apply chain rule to error function: d/dx[erf(u)] = (2/√π)·exp(-u²)·u'",
    teacher:
      'The error function erf(u) is the Gaussian distribution integral. Its derivative follows from the fundamental theorem of calculus: d/dx[erf(u)] = (2/√π)·exp(-u²)·du/dx.'
  }],
  ['gamma', {
    formula: "Apply chain rule to gamma function: d/dx[Γ(u)] = Γ(u)·ψ(u)·u' where ψ is the digamma function",
    teacher:
      'The gamma function Γ(u) generalizes factorials. Its derivative is Γ(u)·ψ(u)·du/dx where ψ (psi) is the digamma function, the logarithmic derivative of gamma.'
  }],
  ['Heaviside', {
    formula: "Apply chain rule to Heaviside step function: d/dx[H(u)] = δ(u)·u' where δ is the Dirac delta",
    teacher:
      'The Heaviside function H(u) is 0 for u<0 and 1 for u>0. Its derivative is the Dirac delta δ(u), a generalized function representing an infinitely sharp spike at u=0.'
  }],
  ['Abs', {
    formula: "Apply chain rule to absolute value: d/dx[|u|] = sign(u)·u'",
    teacher:
      'The absolute value function |u| has derivative sign(u)·du/dx, where sign(u) = u/|u| for u≠0. Note that |u| is not differentiable at u=0.'
  }],
  ['floor', {
    formula: 'Derivative of floor function: d/dx[⌊u⌋] = 0 (except at integers where undefined)',
    teacher:
      "The floor function ⌊u⌋ is a step function that's constant between integers. At non-integer points, its derivative is 0. At integer values of u, the derivative is undefined (the function has a jump discontinuity)."
  }],
  ['ceiling', {
    formula: 'Derivative of ceiling function: d/dx[⌈u⌉] = 0 (except at integers where undefined)',
    teacher:
      "The ceiling function ⌈u⌉ rounds up to the nearest integer. Like floor, it's piecewise constant, so its derivative is 0 at non-integer points and undefined at integer jumps."
  }]
];

function chainRule(fn: string, entry: ChainEntry): RewriteRule {
  const isCall = (d: PendingDerivative): boolean =>
    d.operand.kind === 'call' && d.operand.name === fn && d.operand.args.length === 1;

  return derivativeRule({
    name: `chain_rule_${fn.toLowerCase()}`,
    priority: 85,
    target: isCall,
    replace: (d, open) => {
      const u = d.operand.kind === 'call' ? d.operand.args[0] : d.operand;
      const outer = outerDerivative(fn, u) ?? ZERO;
      // piecewise-constant functions need no inner derivative
      if (outer.kind === 'number' && outer.value.isZero()) return ZERO;
      return mul(outer, open(u, d.variable));
    },
    explanation: () => entry.formula,
    teacher: () => entry.teacher
  });
}

export const chainRules: readonly RewriteRule[] = CHAIN_RULES.map(([fn, entry]) => chainRule(fn, entry));

export const evaluateDerivativeFallback = derivativeRule({
  name: 'evaluate_derivative_fallback',
  priority: -50,
  firstOrderOnly: false,
  manifest: BACKEND_MANIFEST,
  target: () => true,
  replace: d => nthDerivative(d.operand, d.variable, d.order),
  explanation: () => 'Fallback: evaluate derivative (backend).',
  teacher: () => 'Fallback: evaluate derivative (backend).',
  metadata: { backend: true }
});

/**
 * Catch-all for a fully resolved goal: trig identities first, then general simplification
 */
export const simplifyResolved = defineRewriteRule({
  name: 'simplify',
  operation: 'differentiate',
  priority: -200,
  domains: ['calculus'],
  manifest: BACKEND_MANIFEST,
  matches: goal => isResolved(goal),
  apply: goal => {
    const trig = trigSimplify(goal.expression);
    if (!equals(trig, goal.expression)) {
      const explanation = 'Apply trigonometric identities to simplify.';
      return {
        output: replaceExpression(goal, trig),
        explanation,
        metadata: explanations(explanation, 'Use identities like sin²+cos²=1, double angle formulas, etc.', {
          backend: true
        })
      };
    }

    const simplified = simplifyExpression(goal.expression);
    if (equals(simplified, goal.expression)) {
      return { output: goal, explanation: 'No further simplification.', metadata: { noop: true } };
    }
    const explanation = 'Simplify algebraically.';
    return {
      output: replaceExpression(goal, simplified),
      explanation,
      metadata: explanations(explanation, 'We simplify the expression to a standard, cleaner form.', { backend: true })
    };
  }
});

/**
 * In registration order; selection sorts by priority and keeps this order for ties
 */
export const calculusRules: readonly RewriteRule[] = [
  expandHigherOrder,
  diffConstant,
  diffIdentity,
  sumRule,
  constantMultiple,
  quotientRule,
  powerRule,
  exponentialRule,
  productRule,
  logarithmicDifferentiation,
  ...chainRules,
  evaluateDerivativeFallback,
  simplifyResolved
];
