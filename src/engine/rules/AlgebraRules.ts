/**
 * Expansion, factoring and simplification rules
 *
 * Each rule rewrites the whole expression in one step, or reports a no-op when
 * the backend leaves it unchanged.
 */

import { expand } from '../../algebra/Expand.js';
import { factor } from '../../algebra/Factor.js';
import { equals } from '../../algebra/Inspect.js';
import { simplify } from '../../algebra/Simplify.js';
import { trigSimplify } from '../../algebra/Trig.js';
import { replaceExpression } from '../Goal.js';
import { PluginManifest, RewriteRule, defineRewriteRule, explanations } from '../Rule.js';

export const ALGEBRA_MANIFEST: PluginManifest = {
  name: 'stepwise-algebra',
  version: '0.1.0',
  description: 'Expansion, factoring and simplification rules'
};

export const expandExpression = defineRewriteRule({
  name: 'expand_expression',
  operation: 'expand',
  priority: 100,
  domains: ['algebra'],
  manifest: ALGEBRA_MANIFEST,
  apply: goal => {
    const expanded = expand(goal.expression);
    if (equals(expanded, goal.expression)) {
      return { output: goal, explanation: 'Expression is already expanded.', metadata: { noop: true } };
    }
    const explanation = 'Expand using distributive law: multiply out products and powers.';
    return {
      output: replaceExpression(goal, expanded),
      explanation,
      metadata: explanations(
        explanation,
        'Expanding means writing (a+b)² as a²+2ab+b², distributing multiplication over addition.'
      )
    };
  }
});

export const factorExpression = defineRewriteRule({
  name: 'factor_expression',
  operation: 'factor',
  priority: 100,
  domains: ['algebra'],
  manifest: ALGEBRA_MANIFEST,
  apply: goal => {
    const factored = factor(goal.expression);
    if (equals(factored, goal.expression)) {
      return { output: goal, explanation: 'Expression cannot be factored further.', metadata: { noop: true } };
    }
    const explanation = 'Factor by extracting common terms and recognizing patterns.';
    return {
      output: replaceExpression(goal, factored),
      explanation,
      metadata: explanations(
        explanation,
        'Factoring means writing x²+5x+6 as (x+2)(x+3), finding common factors and grouping.'
      )
    };
  }
});

export const simplifyTrig = defineRewriteRule({
  name: 'simplify_trig',
  operation: 'simplify',
  priority: 100,
  domains: ['algebra'],
  manifest: ALGEBRA_MANIFEST,
  apply: goal => {
    const trig = trigSimplify(goal.expression);
    if (!equals(trig, goal.expression)) {
      const explanation = 'Apply trigonometric identities (sin²+cos²=1, double angles, etc.).';
      return {
        output: replaceExpression(goal, trig),
        explanation,
        metadata: explanations(explanation, 'Use fundamental trig identities to combine or reduce trigonometric expressions.')
      };
    }

    const simplified = simplify(goal.expression);
    if (!equals(simplified, goal.expression)) {
      const explanation = 'Simplify algebraically.';
      return {
        output: replaceExpression(goal, simplified),
        explanation,
        metadata: explanations(explanation, 'Combine like terms, cancel common factors, and reduce to simpler form.')
      };
    }

    return { output: goal, explanation: 'Expression is already simplified.', metadata: { noop: true } };
  }
});

export const algebraRules: readonly RewriteRule[] = [expandExpression, factorExpression, simplifyTrig];
