/**
 * Expression trees for the algebra backend.
 *
 * Nodes are plain immutable objects discriminated by `kind`. Sums and products
 * are n-ary and kept canonical by the constructors in Canonical.ts; code outside
 * that module should never build `add`, `mul` or `pow` nodes by hand.
 */

import { Rational } from './Rational.js';

export type Expression =
  | NumberNode
  | SymbolNode
  | AddNode
  | MulNode
  | PowNode
  | CallNode
  | HoleNode;

/**
 * Exact rational constant
 */
export interface NumberNode {
  readonly kind: 'number';
  readonly value: Rational;
}

export interface SymbolNode {
  readonly kind: 'symbol';
  readonly name: string;
}

/**
 * Sum of two or more terms, like terms already collected
 */
export interface AddNode {
  readonly kind: 'add';
  readonly terms: readonly Expression[];
}

/**
 * Product of two or more factors; a numeric coefficient, if any, comes first
 */
export interface MulNode {
  readonly kind: 'mul';
  readonly factors: readonly Expression[];
}

export interface PowNode {
  readonly kind: 'pow';
  readonly base: Expression;
  readonly exponent: Expression;
}

/**
 * Named function application, e.g. sin(x)
 */
export interface CallNode {
  readonly kind: 'call';
  readonly name: string;
  readonly args: readonly Expression[];
}

/**
 * Opaque placeholder. The backend treats it as an atom that depends on nothing;
 * callers attach their own meaning to the id.
 */
export interface HoleNode {
  readonly kind: 'hole';
  readonly id: number;
}

/** Symbols that denote fixed constants rather than variables */
export const CONSTANT_SYMBOLS: ReadonlySet<string> = new Set(['pi', 'E', 'I']);

export function num(value: Rational | number | bigint): NumberNode {
  const rational = value instanceof Rational ? value : Rational.of(value);
  return { kind: 'number', value: rational };
}

export function sym(name: string): SymbolNode {
  return { kind: 'symbol', name };
}

export function hole(id: number): HoleNode {
  return { kind: 'hole', id };
}

export const ZERO: NumberNode = num(Rational.ZERO);
export const ONE: NumberNode = num(Rational.ONE);
export const MINUS_ONE: NumberNode = num(Rational.MINUS_ONE);
export const HALF: NumberNode = num(Rational.of(1n, 2n));
export const PI: SymbolNode = sym('pi');
export const E: SymbolNode = sym('E');

export function isNumber(expr: Expression, value?: Rational): expr is NumberNode {
  return expr.kind === 'number' && (value === undefined || expr.value.equals(value));
}

export function isZero(expr: Expression): boolean {
  return expr.kind === 'number' && expr.value.isZero();
}

export function isOne(expr: Expression): boolean {
  return expr.kind === 'number' && expr.value.isOne();
}

/**
 * Integer value of a numeric node, if it is one
 */
export function integerValue(expr: Expression): bigint | undefined {
  return expr.kind === 'number' && expr.value.isInteger() ? expr.value.num : undefined;
}
