/**
 * Exact matrix arithmetic over expression entries.
 *
 * Matrices travel as JSON text: numbers are numeric entries, strings are parsed as
 * expressions, so `[[1, "a"], [0, 2]]` is a valid upper-triangular matrix.
 * Numeric-only algorithms (eigenvalues) work on Rational grids.
 */

import { Expression, MINUS_ONE, ONE, ZERO, isZero, num } from './AST.js';
import { add, mul, pow, neg, sub } from './Canonical.js';
import {
  DimensionError,
  MatrixFormatError,
  NonSquareMatrixError,
  SingularMatrixError,
  UnsupportedError
} from './Errors.js';
import { expand } from './Expand.js';
import { equals } from './Inspect.js';
import { parseExpression } from './Parser.js';
import {
  Polynomial,
  degree,
  fromPolynomial,
  quadraticRoots,
  rationalRoots
} from './Polynomial.js';
import { print } from './Printer.js';
import { Rational } from './Rational.js';

export type Matrix = Expression[][];

export type MatrixCell = number | string;

export function parseMatrix(text: string): Matrix {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MatrixFormatError(`Could not parse matrix: ${text} (${reason})`, text);
  }

  if (!Array.isArray(data) || data.length === 0) {
    throw new MatrixFormatError(`Could not parse matrix: ${text} (expected a non-empty list of rows)`, text);
  }

  const rows: Matrix = [];
  let width = -1;
  for (const row of data) {
    if (!Array.isArray(row) || row.length === 0) {
      throw new MatrixFormatError(`Could not parse matrix: ${text} (every row must be a non-empty list)`, text);
    }
    if (width >= 0 && row.length !== width) {
      throw new MatrixFormatError(`Could not parse matrix: ${text} (rows have different lengths)`, text);
    }
    width = row.length;
    rows.push(row.map(cell => parseCell(cell, text)));
  }
  return rows;
}

function parseCell(cell: unknown, source: string): Expression {
  if (typeof cell === 'number') {
    return num(Rational.fromNumber(cell));
  }
  if (typeof cell === 'string') {
    return parseExpression(cell);
  }
  throw new MatrixFormatError(`Could not parse matrix: ${source} (unsupported entry ${JSON.stringify(cell)})`, source);
}

/**
 * JSON value of an entry: integers stay integers, other rationals become floats, everything else prints as text
 */
export function formatCell(entry: Expression): MatrixCell {
  if (entry.kind === 'number') {
    return entry.value.isInteger() ? Number(entry.value.num) : entry.value.toNumber();
  }
  return print(entry);
}

export function toCells(m: Matrix): MatrixCell[][] {
  return m.map(row => row.map(formatCell));
}

export function formatMatrix(m: Matrix): string {
  return JSON.stringify(toCells(m));
}

export function shape(m: Matrix): [number, number] {
  return [m.length, m[0]?.length ?? 0];
}

export function describeShape(m: Matrix): string {
  const [rows, cols] = shape(m);
  return `${rows}×${cols}`;
}

export function requireSquare(m: Matrix, operation: string): number {
  const [rows, cols] = shape(m);
  if (rows !== cols) {
    throw new NonSquareMatrixError(operation, rows, cols);
  }
  return rows;
}

export function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? ONE : ZERO)));
}

export function transpose(m: Matrix): Matrix {
  const [rows, cols] = shape(m);
  return Array.from({ length: cols }, (_, j) => Array.from({ length: rows }, (_, i) => m[i][j]));
}

export function matricesEqual(a: Matrix, b: Matrix): boolean {
  const [ra, ca] = shape(a);
  const [rb, cb] = shape(b);
  if (ra !== rb || ca !== cb) return false;
  return a.every((row, i) => row.every((entry, j) => equals(expand(entry), expand(b[i][j]))));
}

/**
 * Products a[i][k]*b[k][j] that sum to entry (i, j) of a*b
 */
export function dotTerms(a: Matrix, b: Matrix, i: number, j: number): Array<[Expression, Expression, Expression]> {
  return a[i].map((left, k) => [left, b[k][j], mul(left, b[k][j])]);
}

export function matMul(a: Matrix, b: Matrix): Matrix {
  const [m, n] = shape(a);
  const [rowsB, p] = shape(b);
  if (n !== rowsB) {
    throw new DimensionError(
      `Cannot multiply matrices: A is ${m}×${n}, B is ${rowsB}×${p}. ` +
        `Number of columns in A (${n}) must equal number of rows in B (${rowsB}).`,
      [m, n],
      [rowsB, p]
    );
  }
  return Array.from({ length: m }, (_, i) =>
    Array.from({ length: p }, (_, j) => expand(add(...dotTerms(a, b, i, j).map(([, , product]) => product))))
  );
}

export function minor(m: Matrix, row: number, col: number): Matrix {
  return m.filter((_, i) => i !== row).map(r => r.filter((_, j) => j !== col));
}

export function toRationalMatrix(m: Matrix): Rational[][] | undefined {
  const out: Rational[][] = [];
  for (const row of m) {
    const values: Rational[] = [];
    for (const entry of row) {
      if (entry.kind !== 'number') return undefined;
      values.push(entry.value);
    }
    out.push(values);
  }
  return out;
}

export function determinant(m: Matrix): Expression {
  const n = requireSquare(m, 'Determinant');
  if (n === 1) return m[0][0];

  const numeric = toRationalMatrix(m);
  if (numeric) return num(rationalDeterminant(numeric));

  // cofactor expansion along the first row
  const terms = m[0].map((entry, j) => {
    const sign = j % 2 === 0 ? ONE : MINUS_ONE;
    return mul(sign, entry, determinant(minor(m, 0, j)));
  });
  return expand(add(...terms));
}

function rationalDeterminant(input: Rational[][]): Rational {
  const a = input.map(row => row.slice());
  const n = a.length;
  let det = Rational.ONE;

  for (let k = 0; k < n; k++) {
    let pivot = k;
    while (pivot < n && a[pivot][k].isZero()) pivot++;
    if (pivot === n) return Rational.ZERO;
    if (pivot !== k) {
      [a[pivot], a[k]] = [a[k], a[pivot]];
      det = det.neg();
    }
    det = det.mul(a[k][k]);
    for (let i = k + 1; i < n; i++) {
      const factor = a[i][k].div(a[k][k]);
      for (let j = k; j < n; j++) {
        a[i][j] = a[i][j].sub(factor.mul(a[k][j]));
      }
    }
  }
  return det;
}

export function cofactor(m: Matrix, row: number, col: number): Expression {
  const sign = (row + col) % 2 === 0 ? ONE : MINUS_ONE;
  return mul(sign, determinant(minor(m, row, col)));
}

/**
 * Transpose of the cofactor matrix
 */
export function adjugate(m: Matrix): Matrix {
  const n = requireSquare(m, 'Adjugate');
  if (n === 1) return [[ONE]];
  const cofactors = m.map((row, i) => row.map((_, j) => cofactor(m, i, j)));
  return transpose(cofactors);
}

export function scale(m: Matrix, factor: Expression): Matrix {
  return m.map(row => row.map(entry => expand(mul(factor, entry))));
}

export function inverse(m: Matrix): Matrix {
  requireSquare(m, 'Matrix inverse');
  const det = determinant(m);
  if (isZero(det)) {
    throw new SingularMatrixError(print(det));
  }
  return scale(adjugate(m), pow(det, MINUS_ONE));
}

function divide(a: Expression, b: Expression): Expression {
  return expand(mul(a, pow(b, MINUS_ONE)));
}

function subtractMultiple(a: Expression, factor: Expression, b: Expression): Expression {
  return expand(sub(a, mul(factor, b)));
}

export type RowOperation =
  | { kind: 'swap'; row: number; with: number; matrix: Matrix }
  | { kind: 'scale'; row: number; pivot: Expression; matrix: Matrix }
  | { kind: 'eliminate'; row: number; pivotRow: number; column: number; factor: Expression; matrix: Matrix };

/**
 * Gauss-Jordan elimination to reduced row echelon form, recording every row operation
 */
export function rowReduce(input: Matrix): { result: Matrix; operations: RowOperation[]; pivotColumns: number[] } {
  const r = input.map(row => row.slice());
  const [rows, cols] = shape(r);
  const operations: RowOperation[] = [];
  const pivotColumns: number[] = [];
  const snapshot = (): Matrix => r.map(row => row.slice());

  let current = 0;
  for (let col = 0; col < cols && current < rows; col++) {
    let pivotRow = current;
    while (pivotRow < rows && isZero(r[pivotRow][col])) pivotRow++;
    if (pivotRow === rows) continue;

    if (pivotRow !== current) {
      [r[pivotRow], r[current]] = [r[current], r[pivotRow]];
      operations.push({ kind: 'swap', row: current, with: pivotRow, matrix: snapshot() });
    }

    const pivot = r[current][col];
    if (!(pivot.kind === 'number' && pivot.value.isOne())) {
      r[current] = r[current].map(entry => divide(entry, pivot));
      operations.push({ kind: 'scale', row: current, pivot, matrix: snapshot() });
    }

    for (let row = 0; row < rows; row++) {
      if (row === current) continue;
      const factor = r[row][col];
      if (isZero(factor)) continue;
      r[row] = r[row].map((entry, j) => subtractMultiple(entry, factor, r[current][j]));
      operations.push({ kind: 'eliminate', row, pivotRow: current, column: col, factor, matrix: snapshot() });
    }

    pivotColumns.push(col);
    current++;
  }

  return { result: r, operations, pivotColumns };
}

export interface LuColumnStep {
  column: number;
  pivotRow: number;
  swapped: boolean;
  multipliers: Array<{ row: number; factor: Expression }>;
  upper: Matrix;
}

export interface LuDecomposition {
  P: Matrix;
  L: Matrix;
  U: Matrix;
  steps: LuColumnStep[];
}

/**
 * PA = LU with partial pivoting. Numeric columns pivot on the largest magnitude,
 * symbolic ones on the first non-zero entry.
 */
export function luDecompose(input: Matrix): LuDecomposition {
  const n = requireSquare(input, 'LU decomposition');
  const U = input.map(row => row.slice());
  const L: Matrix = Array.from({ length: n }, () => Array.from({ length: n }, () => ZERO));
  const perm = Array.from({ length: n }, (_, i) => i);
  const steps: LuColumnStep[] = [];

  for (let k = 0; k < n; k++) {
    const pivotRow = choosePivot(U, k);
    if (pivotRow === undefined) {
      steps.push({ column: k, pivotRow: k, swapped: false, multipliers: [], upper: U.map(r => r.slice()) });
      continue;
    }

    const swapped = pivotRow !== k;
    if (swapped) {
      [U[pivotRow], U[k]] = [U[k], U[pivotRow]];
      [perm[pivotRow], perm[k]] = [perm[k], perm[pivotRow]];
      for (let j = 0; j < k; j++) {
        [L[pivotRow][j], L[k][j]] = [L[k][j], L[pivotRow][j]];
      }
    }

    const multipliers: Array<{ row: number; factor: Expression }> = [];
    for (let i = k + 1; i < n; i++) {
      if (isZero(U[i][k])) continue;
      const factor = divide(U[i][k], U[k][k]);
      L[i][k] = factor;
      U[i] = U[i].map((entry, j) => (j === k ? ZERO : subtractMultiple(entry, factor, U[k][j])));
      multipliers.push({ row: i, factor });
    }

    steps.push({ column: k, pivotRow, swapped, multipliers, upper: U.map(r => r.slice()) });
  }

  for (let i = 0; i < n; i++) L[i][i] = ONE;
  const P: Matrix = perm.map(source => Array.from({ length: n }, (_, j) => (j === source ? ONE : ZERO)));

  return { P, L, U, steps };
}

function choosePivot(U: Matrix, k: number): number | undefined {
  const n = U.length;
  let best: number | undefined;
  let bestMagnitude: Rational | undefined;

  for (let i = k; i < n; i++) {
    const entry = U[i][k];
    if (isZero(entry)) continue;
    if (entry.kind !== 'number') {
      // symbolic column: first non-zero wins
      return best ?? i;
    }
    const magnitude = entry.value.abs();
    if (bestMagnitude === undefined || magnitude.compare(bestMagnitude) > 0) {
      best = i;
      bestMagnitude = magnitude;
    }
  }
  return best;
}

/**
 * Coefficients of det(lambda*I - A) by the Faddeev-LeVerrier recurrence
 */
export function characteristicPolynomial(m: Matrix): Polynomial {
  const n = requireSquare(m, 'Characteristic polynomial');
  const a = toRationalMatrix(m);
  if (!a) {
    throw new UnsupportedError('Characteristic polynomial needs a numeric matrix');
  }

  const coefficients: Rational[] = new Array<Rational>(n + 1).fill(Rational.ZERO);
  coefficients[n] = Rational.ONE;
  let M: Rational[][] = a.map(row => row.map(() => Rational.ZERO));

  for (let k = 1; k <= n; k++) {
    const product = rationalMatMul(a, M);
    M = product.map((row, i) => row.map((v, j) => (i === j ? v.add(coefficients[n - k + 1]) : v)));
    const am = rationalMatMul(a, M);
    let trace = Rational.ZERO;
    for (let i = 0; i < n; i++) trace = trace.add(am[i][i]);
    coefficients[n - k] = trace.div(Rational.of(k)).neg();
  }
  return coefficients;
}

function rationalMatMul(a: Rational[][], b: Rational[][]): Rational[][] {
  return a.map(row =>
    b[0].map((_, j) => row.reduce((acc, v, k) => acc.add(v.mul(b[k][j])), Rational.ZERO))
  );
}

/**
 * det(A - lambda*I) as an expression in `lambda`
 */
export function characteristicExpression(m: Matrix, variable: string = 'lambda'): Expression {
  const p = characteristicPolynomial(m);
  const signed = p.length % 2 === 0 ? p.map(c => c.neg()) : p;
  return fromPolynomial(signed, variable);
}

export interface Eigenvalue {
  value: Expression;
  multiplicity: number;
}

export function eigenvalues(m: Matrix): Eigenvalue[] {
  const p = characteristicPolynomial(m);
  const { roots, remainder } = rationalRoots(p);
  const out: Eigenvalue[] = roots.map(r => ({ value: num(r.value), multiplicity: r.multiplicity }));

  const rest = degree(remainder);
  if (rest === 2) {
    for (const root of quadraticRoots(remainder)) {
      out.push({ value: root, multiplicity: 1 });
    }
  } else if (rest > 2) {
    throw new UnsupportedError('Eigenvalues have no closed form for this matrix', `degree ${rest} factor`);
  }
  return out;
}

/**
 * Basis of the null space of a numeric matrix
 */
export function nullspace(m: Matrix): Matrix {
  const [, cols] = shape(m);
  const { result, pivotColumns } = rowReduce(m);
  const basis: Matrix = [];

  for (let free = 0; free < cols; free++) {
    if (pivotColumns.includes(free)) continue;
    const vector: Expression[] = Array.from({ length: cols }, (_, j) => (j === free ? ONE : ZERO));
    pivotColumns.forEach((pivotCol, row) => {
      vector[pivotCol] = neg(result[row][free]);
    });
    basis.push(vector);
  }
  return basis;
}

/**
 * Eigenvectors for one eigenvalue. Rational eigenvalues use the null space of A - lambda*I;
 * irrational ones are only solved in closed form for 2×2 matrices.
 */
export function eigenvectors(m: Matrix, value: Expression): Matrix {
  const n = requireSquare(m, 'Eigenvectors');
  if (value.kind === 'number') {
    const shifted = m.map((row, i) => row.map((entry, j) => (i === j ? sub(entry, value) : entry)));
    return nullspace(shifted);
  }
  if (n === 2) {
    const [[a, b], [c, d]] = m;
    if (!isZero(b)) return [[b, expand(sub(value, a))]];
    if (!isZero(c)) return [[expand(sub(value, d)), c]];
  }
  return [];
}
