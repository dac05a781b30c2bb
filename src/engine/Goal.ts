/**
 * Goals: expressions with pending derivatives.
 *
 * A pending derivative is an opaque hole atom in the expression plus an entry in
 * `pending` saying what the hole stands for. Rules resolve one hole at a time;
 * the replacement may open new holes. Holes that disappear from the expression
 * (for example multiplied by zero) are dropped from `pending`.
 */

import { Expression, hole } from '../algebra/AST.js';
import { holeIds, preorder, substituteHoles } from '../algebra/Inspect.js';
import { print } from '../algebra/Printer.js';

export interface PendingDerivative {
  readonly operand: Expression;
  readonly variable: string;
  readonly order: number;
}

export interface Goal {
  readonly expression: Expression;
  readonly pending: ReadonlyMap<number, PendingDerivative>;
  /** Next unused hole id */
  readonly nextHole: number;
}

export interface PendingMatch {
  id: number;
  derivative: PendingDerivative;
}

/**
 * Opens a new hole for d^order(operand)/d(variable)^order and returns the hole atom
 */
export type OpenDerivative = (operand: Expression, variable: string, order?: number) => Expression;

export function createGoal(expression: Expression): Goal {
  return { expression, pending: new Map(), nextHole: 0 };
}

export function derivativeGoal(operand: Expression, variable: string, order: number = 1): Goal {
  return {
    expression: hole(0),
    pending: new Map([[0, { operand, variable, order }]]),
    nextHole: 1
  };
}

export function isResolved(goal: Goal): boolean {
  return goal.pending.size === 0;
}

export function derivativeText(derivative: PendingDerivative): string {
  const operand = print(derivative.operand);
  return derivative.order === 1
    ? `Derivative(${operand}, ${derivative.variable})`
    : `Derivative(${operand}, (${derivative.variable}, ${derivative.order}))`;
}

export function goalText(goal: Goal): string {
  return print(goal.expression, {
    renderHole: id => {
      const derivative = goal.pending.get(id);
      return derivative ? derivativeText(derivative) : `_h${id}`;
    }
  });
}

/**
 * First pending derivative in preorder that satisfies `predicate`
 */
export function findPending(
  goal: Goal,
  predicate: (derivative: PendingDerivative) => boolean = () => true
): PendingMatch | undefined {
  for (const node of preorder(goal.expression)) {
    if (node.kind !== 'hole') continue;
    const derivative = goal.pending.get(node.id);
    if (derivative && predicate(derivative)) {
      return { id: node.id, derivative };
    }
  }
  return undefined;
}

/**
 * Replace hole `id` with the expression built by `build`, which may open new holes
 */
export function resolvePending(goal: Goal, id: number, build: (open: OpenDerivative) => Expression): Goal {
  const pending = new Map(goal.pending);
  pending.delete(id);
  let nextHole = goal.nextHole;

  const open: OpenDerivative = (operand, variable, order = 1) => {
    const fresh = nextHole++;
    pending.set(fresh, { operand, variable, order });
    return hole(fresh);
  };

  const replacement = build(open);
  const expression = substituteHoles(goal.expression, new Map([[id, replacement]]));

  const present = new Set(holeIds(expression));
  for (const key of [...pending.keys()]) {
    if (!present.has(key)) pending.delete(key);
  }

  return { expression, pending, nextHole };
}

/**
 * Replace the whole expression of a goal without pending derivatives
 */
export function replaceExpression(goal: Goal, expression: Expression): Goal {
  const present = new Set(holeIds(expression));
  const pending = new Map([...goal.pending].filter(([id]) => present.has(id)));
  return { expression, pending, nextHole: goal.nextHole };
}
