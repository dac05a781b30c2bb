/**
 * Structural queries and rebuilding traversals over expression trees
 */

import { CONSTANT_SYMBOLS, Expression } from './AST.js';
import { add, mul, pow, call } from './Canonical.js';
import { printKey } from './Printer.js';

export function equals(a: Expression, b: Expression): boolean {
  return a === b || printKey(a) === printKey(b);
}

/**
 * Variable symbols occurring in the tree, excluding constants such as pi and E
 */
export function freeSymbols(expr: Expression): Set<string> {
  const out = new Set<string>();
  for (const node of preorder(expr)) {
    if (node.kind === 'symbol' && !CONSTANT_SYMBOLS.has(node.name)) {
      out.add(node.name);
    }
  }
  return out;
}

export function dependsOn(expr: Expression, variable: string): boolean {
  for (const node of preorder(expr)) {
    if (node.kind === 'symbol' && node.name === variable) return true;
  }
  return false;
}

export function children(expr: Expression): readonly Expression[] {
  switch (expr.kind) {
    case 'add':
      return expr.terms;
    case 'mul':
      return expr.factors;
    case 'pow':
      return [expr.base, expr.exponent];
    case 'call':
      return expr.args;
    default:
      return [];
  }
}

/**
 * Depth-first, parent before children, in stored operand order
 */
export function* preorder(expr: Expression): Generator<Expression> {
  yield expr;
  for (const child of children(expr)) {
    yield* preorder(child);
  }
}

/**
 * Rebuild a node from transformed children through the canonical constructors
 */
export function rebuild(expr: Expression, transform: (child: Expression) => Expression): Expression {
  switch (expr.kind) {
    case 'add':
      return add(...expr.terms.map(transform));
    case 'mul':
      return mul(...expr.factors.map(transform));
    case 'pow':
      return pow(transform(expr.base), transform(expr.exponent));
    case 'call':
      return call(expr.name, expr.args.map(transform));
    default:
      return expr;
  }
}

/**
 * Apply `rewrite` to every node, children first
 */
export function bottomUp(expr: Expression, rewrite: (node: Expression) => Expression): Expression {
  return rewrite(rebuild(expr, child => bottomUp(child, rewrite)));
}

export function substituteHoles(expr: Expression, replacements: ReadonlyMap<number, Expression>): Expression {
  if (expr.kind === 'hole') {
    return replacements.get(expr.id) ?? expr;
  }
  if (children(expr).length === 0) return expr;
  return rebuild(expr, child => substituteHoles(child, replacements));
}

export function holeIds(expr: Expression): number[] {
  const ids: number[] = [];
  for (const node of preorder(expr)) {
    if (node.kind === 'hole') ids.push(node.id);
  }
  return ids;
}

/**
 * Node count, used to compare candidate simplifications
 */
export function size(expr: Expression): number {
  let count = 0;
  for (const _node of preorder(expr)) count++;
  return count;
}
