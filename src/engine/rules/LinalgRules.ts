/**
 * Linear algebra rules
 *
 * Structured rules: each handles a whole matrix request in one call, appending
 * its explanatory nodes to the graph and returning the final matrix (or a JSON
 * summary) as text.
 */

import { Expression } from '../../algebra/AST.js';
import { mul, neg } from '../../algebra/Canonical.js';
import { AlgebraError } from '../../algebra/Errors.js';
import { expand } from '../../algebra/Expand.js';
import {
  Matrix,
  MatrixCell,
  RowOperation,
  adjugate,
  characteristicExpression,
  describeShape,
  determinant,
  dotTerms,
  eigenvalues,
  eigenvectors,
  formatCell,
  formatMatrix,
  inverse,
  luDecompose,
  matMul,
  matricesEqual,
  minor,
  requireSquare,
  rowReduce,
  shape,
  toCells
} from '../../algebra/Matrix.js';
import { print } from '../../algebra/Printer.js';
import { InputError } from '../Errors.js';
import type { StepGraph } from '../Models.js';
import { MatrixRequest, PluginManifest, RuleResult, StructuredRule, defineStructuredRule, explanations } from '../Rule.js';

export const LINALG_MANIFEST: PluginManifest = {
  name: 'stepwise-linalg',
  version: '0.1.0',
  description: 'Step-by-step matrix operations'
};

/** Element nodes stop once the graph holds this many nodes */
const MAX_ELEMENT_NODES = 8;

function linalgRule(
  operation: string,
  apply: (request: MatrixRequest, graph: StepGraph) => RuleResult<string>
): StructuredRule {
  return defineStructuredRule({
    name: operation,
    operation,
    priority: 100,
    domains: ['linear_algebra'],
    manifest: LINALG_MANIFEST,
    apply
  });
}

export const matrixMultiply = linalgRule('matrix_multiply', (request, graph) => {
  const a = request.matrix;
  const b = request.matrixB;
  if (!b) {
    throw new InputError('matrix_multiply needs a second matrix', 'matrixB');
  }

  const product = matMul(a, b);
  const [m, n] = shape(a);
  const [, p] = shape(b);

  for (let i = 0; i < m; i++) {
    for (let j = 0; j < p; j++) {
      if (graph.size >= MAX_ELEMENT_NODES) break;
      const terms = dotTerms(a, b, i, j);
      const factors = terms.map(([x, y]) => `(${print(x)})·(${print(y)})`).join(' + ');
      const products = terms.map(([, , xy]) => print(xy)).join(' + ');
      const element = print(product[i][j]);
      graph.append({
        id: `element_${i}_${j}`,
        operation: 'matrix_multiply',
        rule: 'multiply_element',
        input: `C[${i},${j}] = ${factors}`,
        output: element,
        explanation: `Calculate element (${i},${j}) by taking row ${i} of A times column ${j} of B: ${products} = ${element}`
      });
    }
  }

  const explanation =
    `Multiply ${m}×${n} matrix A by ${n}×${p} matrix B to get ${m}×${p} matrix C. ` +
    'Each element C[i,j] is the dot product of row i from A and column j from B.';
  return {
    output: formatMatrix(product),
    explanation,
    metadata: explanations(
      explanation,
      'Matrix multiplication works by taking each row of the first matrix and each column of the second matrix, ' +
        `multiplying corresponding elements, and summing them up. The result has dimensions ${m}×${p}.`
    )
  };
});

export const matrixDeterminant = linalgRule('matrix_determinant', (request, graph) => {
  const m = request.matrix;
  const n = requireSquare(m, 'Determinant');
  const det = determinant(m);
  const detText = print(det);

  if (n === 1) {
    const explanation = `For a 1×1 matrix, the determinant is simply the element itself: ${detText}`;
    return {
      output: detText,
      explanation,
      metadata: explanations(explanation, 'A 1×1 matrix contains just one number, so that number is its determinant.')
    };
  }

  if (n === 2) {
    const [[a, b], [c, d]] = m;
    const ad = print(expand(mul(a, d)));
    const bc = print(expand(mul(b, c)));
    graph.append({
      id: 'det_2x2',
      operation: 'matrix_determinant',
      rule: 'determinant_2x2',
      input: `det([[${print(a)}, ${print(b)}], [${print(c)}, ${print(d)}]])`,
      output: detText,
      explanation: `For a 2×2 matrix, det = ad - bc = (${print(a)})(${print(d)}) - (${print(b)})(${print(c)}) = ${ad} - ${bc} = ${detText}`
    });

    const explanation = 'Calculate determinant using 2×2 formula: ad - bc';
    return {
      output: detText,
      explanation,
      metadata: explanations(
        explanation,
        'For a 2×2 matrix [[a,b],[c,d]], the determinant is ad-bc. This represents the signed area of the parallelogram formed by the row vectors.'
      )
    };
  }

  const minorIds: string[] = [];
  const expansion: string[] = [];
  m[0].forEach((entry, j) => {
    const reduced = minor(m, 0, j);
    const minorDet = print(determinant(reduced));
    const sign = j % 2 === 0 ? '+' : '-';
    expansion.push(`${sign}${print(entry)}·det(M${j}) = ${sign}${print(entry)}·(${minorDet})`);

    const node = graph.append({
      id: `minor_0_${j}`,
      operation: 'matrix_determinant',
      rule: 'cofactor_expansion',
      input: `Minor M[0,${j}] = det(${formatMatrix(reduced)})`,
      output: minorDet,
      explanation: `Calculate ${describeShape(reduced)} minor by removing row 0 and column ${j}`
    });
    minorIds.push(node.id);
  });

  graph.append({
    id: 'cofactor_sum',
    operation: 'matrix_determinant',
    rule: 'cofactor_expansion',
    input: `det(A) = ${expansion.join(' + ')}`,
    output: detText,
    explanation: 'Sum the cofactor terms to get the determinant',
    dependencies: minorIds
  });

  const explanation = `Calculate ${n}×${n} determinant using cofactor expansion along the first row`;
  return {
    output: detText,
    explanation,
    metadata: explanations(
      explanation,
      'Cofactor expansion breaks down an n×n determinant into n smaller (n-1)×(n-1) determinants. ' +
        'For each element in the first row, multiply it by its cofactor (with alternating signs) and sum them.'
    )
  };
});

export const matrixInverse = linalgRule('matrix_inverse', (request, graph) => {
  const m = request.matrix;
  const n = requireSquare(m, 'Matrix inverse');
  // throws SingularMatrixError before any node is recorded
  const inv = inverse(m);
  const det = print(determinant(m));
  const result = formatMatrix(inv);

  if (n === 2) {
    const [[a, b], [c, d]] = m;
    const detNode = graph.append({
      id: 'det_calc',
      operation: 'matrix_inverse',
      rule: 'inverse_2x2',
      input: `det(A) = ad - bc = (${print(a)})(${print(d)}) - (${print(b)})(${print(c)})`,
      output: det,
      explanation: `Calculate determinant: ${print(expand(mul(a, d)))} - ${print(expand(mul(b, c)))} = ${det}`
    });
    graph.append({
      id: 'inverse_formula',
      operation: 'matrix_inverse',
      rule: 'inverse_2x2',
      input: `A^-1 = (1/${det}) * [[${print(d)}, ${print(neg(b))}], [${print(neg(c))}, ${print(a)}]]`,
      output: result,
      explanation: 'Apply 2×2 inverse formula: swap diagonal, negate off-diagonal, divide by determinant',
      dependencies: [detNode.id]
    });

    const explanation = 'Calculate inverse using 2×2 formula: A^-1 = (1/det(A)) * adj(A)';
    return {
      output: result,
      explanation,
      metadata: explanations(
        explanation,
        'For a 2×2 matrix [[a,b],[c,d]], the inverse is (1/(ad-bc)) * [[d,-b],[-c,a]]. ' +
          'This swaps the diagonal elements, negates the off-diagonal elements, and divides everything by the determinant.'
      )
    };
  }

  const detNode = graph.append({
    id: 'det_calc',
    operation: 'matrix_inverse',
    rule: 'inverse_adjugate',
    input: 'det(A)',
    output: det,
    explanation: `Calculate determinant of ${n}×${n} matrix: ${det}`
  });
  const adjNode = graph.append({
    id: 'adjugate_calc',
    operation: 'matrix_inverse',
    rule: 'inverse_adjugate',
    input: 'Compute adjugate matrix (transpose of cofactor matrix)',
    output: formatMatrix(adjugate(m)),
    explanation: 'Form the matrix of cofactors, then transpose it to get the adjugate'
  });
  graph.append({
    id: 'inverse_result',
    operation: 'matrix_inverse',
    rule: 'inverse_adjugate',
    input: `A^-1 = (1/${det}) * adj(A)`,
    output: result,
    explanation: `Multiply adjugate matrix by 1/${det} to get the inverse`,
    dependencies: [detNode.id, adjNode.id]
  });

  const explanation = `Calculate ${n}×${n} inverse using adjugate method: A^-1 = (1/det(A)) * adj(A)`;
  return {
    output: result,
    explanation,
    metadata: explanations(
      explanation,
      'The inverse is computed using the adjugate (adjoint) matrix. ' +
        'The adjugate is the transpose of the cofactor matrix. ' +
        'Dividing the adjugate by the determinant gives the inverse. ' +
        'The result satisfies A * A^-1 = I (identity matrix).'
    )
  };
});

interface RowStep {
  id: string;
  rule: string;
  input: string;
  explanation: string;
  /** Short notation such as `R2 → R2 - (3) * R1` */
  notation: string;
}

function describeRowOperation(op: RowOperation): RowStep {
  switch (op.kind) {
    case 'swap':
      return {
        id: `rref_swap_${op.row}_${op.with}`,
        rule: 'rref_swap',
        input: `Swap row ${op.row + 1} with row ${op.with + 1}`,
        explanation: `Move nonzero pivot to row ${op.row + 1}`,
        notation: `R${op.row + 1} ↔ R${op.with + 1}`
      };
    case 'scale':
      return {
        id: `rref_scale_${op.row}`,
        rule: 'rref_scale',
        input: `Divide row ${op.row + 1} by ${print(op.pivot)}`,
        explanation: 'Scale row to make pivot = 1',
        notation: `R${op.row + 1} → (1/${print(op.pivot)}) * R${op.row + 1}`
      };
    case 'eliminate':
      return {
        id: `rref_eliminate_${op.row}_${op.pivotRow}`,
        rule: 'rref_eliminate',
        input: `Eliminate entry at row ${op.row + 1}, column ${op.column + 1}`,
        explanation: `Subtract ${print(op.factor)} times row ${op.pivotRow + 1} from row ${op.row + 1}`,
        notation: `R${op.row + 1} → R${op.row + 1} - (${print(op.factor)}) * R${op.pivotRow + 1}`
      };
  }
}

export const matrixRref = linalgRule('matrix_rref', (request, graph) => {
  const m = request.matrix;
  const [rows, cols] = shape(m);
  const { result, operations } = rowReduce(m);

  let previous = graph.append({
    id: 'rref_start',
    operation: 'matrix_rref',
    rule: 'rref_initialize',
    input: formatMatrix(m),
    output: `Starting ${rows}×${cols} matrix`,
    explanation: 'Begin row reduction to transform matrix to RREF'
  }).id;

  const notations: string[] = [];
  for (const op of operations) {
    const step = describeRowOperation(op);
    notations.push(step.notation);
    previous = graph.append({
      id: step.id,
      operation: 'matrix_rref',
      rule: step.rule,
      input: step.input,
      output: formatMatrix(op.matrix),
      explanation: step.explanation,
      dependencies: [previous]
    }).id;
  }

  const output = formatMatrix(result);
  graph.append({
    id: 'rref_complete',
    operation: 'matrix_rref',
    rule: 'rref_final',
    input: 'All row operations complete',
    output,
    explanation: 'Matrix is now in reduced row echelon form',
    dependencies: [previous]
  });

  const explanation = `Transform ${rows}×${cols} matrix to RREF using ${operations.length} row operations`;
  return {
    output,
    explanation,
    metadata: explanations(
      explanation,
      'RREF is computed through systematic row operations: ' +
        '(1) Find pivot (leading nonzero) in each column, ' +
        '(2) Swap rows to position pivot correctly, ' +
        '(3) Scale row to make pivot = 1, ' +
        '(4) Eliminate all other entries in pivot column. ' +
        'The result is unique for any matrix and useful for solving linear systems, ' +
        'finding rank, and determining linear independence. ' +
        `Operations performed: ${notations.length > 0 ? notations.join('; ') : 'None needed (already in RREF)'}`
    )
  };
});

interface EigenSummary {
  eigenvalues: Array<{ value: MatrixCell; multiplicity: number }>;
  eigenvectors: Record<string, MatrixCell[][]>;
}

export const matrixEigenvalues = linalgRule('matrix_eigenvalues', (request, graph) => {
  const m = request.matrix;
  const n = requireSquare(m, 'Eigenvalue computation');

  const start = graph.append({
    id: 'eigenvalues_start',
    operation: 'matrix_eigenvalues',
    rule: 'eigenvalues_initialize',
    input: formatMatrix(m),
    output: `Starting ${n}×${n} matrix`,
    explanation: 'Find eigenvalues λ by solving det(A - λI) = 0'
  });

  const values = eigenvalues(m);
  const characteristic = graph.append({
    id: 'eigenvalues_characteristic',
    operation: 'matrix_eigenvalues',
    rule: 'eigenvalues_characteristic_poly',
    input: 'Compute characteristic polynomial det(A - λI)',
    output: print(characteristicExpression(m)),
    explanation: `The characteristic polynomial gives the eigenvalues when solved: found ${values.length} distinct eigenvalue(s)`,
    dependencies: [start.id]
  });

  const summary: EigenSummary = { eigenvalues: [], eigenvectors: {} };
  values.forEach(({ value, multiplicity }, i) => {
    const text = print(value);
    summary.eigenvalues.push({ value: formatCell(value), multiplicity });

    const found = graph.append({
      id: `eigenvalue_${i}`,
      operation: 'matrix_eigenvalues',
      rule: 'eigenvalue_found',
      input: `λ${i + 1} = ${text}`,
      output: `Multiplicity: ${multiplicity}`,
      explanation: `Eigenvalue λ${i + 1} = ${text} with algebraic multiplicity ${multiplicity}`,
      dependencies: [characteristic.id]
    });

    const vectors: Matrix = eigenvectors(m, value);
    summary.eigenvectors[text] = vectors.map(v => v.map(formatCell));
    vectors.forEach((vector, j) => {
      graph.append({
        id: `eigenvector_${i}_${j}`,
        operation: 'matrix_eigenvalues',
        rule: 'eigenvector_found',
        input: `Solve (A - ${text}I)v = 0`,
        output: JSON.stringify(vector.map(formatCell)),
        explanation: `Eigenvector v${j + 1} for λ${i + 1}: satisfies Av = ${text}v`,
        dependencies: [found.id]
      });
    });
  });

  const explanation = `Found ${values.length} distinct eigenvalue(s) for ${n}×${n} matrix`;
  return {
    output: JSON.stringify(summary),
    explanation,
    metadata: explanations(
      explanation,
      'Eigenvalues are found by solving the characteristic equation det(A - λI) = 0. ' +
        'Each eigenvalue λ has corresponding eigenvectors v that satisfy Av = λv. ' +
        'Eigenvalues represent how much a matrix scales vectors in certain directions. ' +
        'The algebraic multiplicity is how many times an eigenvalue appears as a root. ' +
        'Eigenvectors form the basis for understanding matrix transformations and diagonalization.'
    )
  };
});

function describeMultipliers(multipliers: ReadonlyArray<{ row: number; factor: Expression }>, column: number): string {
  if (multipliers.length === 0) {
    return `No entries to eliminate below the pivot in column ${column + 1}`;
  }
  const parts = multipliers.map(({ row, factor }) => `l${row + 1}${column + 1} = ${print(factor)}`);
  return `Eliminate entries below the pivot in column ${column + 1} with multipliers ${parts.join(', ')}`;
}

export const matrixLu = linalgRule('matrix_lu', (request, graph) => {
  const m = request.matrix;
  const n = requireSquare(m, 'LU decomposition');
  const { P, L, U, steps } = luDecompose(m);

  let previous = graph.append({
    id: 'lu_start',
    operation: 'matrix_lu',
    rule: 'lu_initialize',
    input: formatMatrix(m),
    output: `Starting ${n}×${n} matrix`,
    explanation: 'Decompose A into PA = LU using Gaussian elimination with partial pivoting'
  }).id;

  for (const step of steps) {
    const swap = step.swapped ? ` (swap rows ${step.column + 1} and ${step.pivotRow + 1})` : '';
    previous = graph.append({
      id: `lu_column_${step.column}`,
      operation: 'matrix_lu',
      rule: 'lu_elimination',
      input: `Column ${step.column + 1}: pivot in row ${step.pivotRow + 1}${swap}`,
      output: formatMatrix(step.upper),
      explanation: describeMultipliers(step.multipliers, step.column),
      dependencies: [previous]
    }).id;
  }

  const pivot = graph.append({
    id: 'lu_pivot',
    operation: 'matrix_lu',
    rule: 'lu_permutation',
    input: 'Apply partial pivoting',
    output: formatMatrix(P),
    explanation: 'Permutation matrix P records row swaps for numerical stability',
    dependencies: [previous]
  });
  const lower = graph.append({
    id: 'lu_lower',
    operation: 'matrix_lu',
    rule: 'lu_lower_triangular',
    input: 'Compute lower triangular matrix L',
    output: formatMatrix(L),
    explanation: 'L is lower triangular with 1s on diagonal, stores elimination multipliers',
    dependencies: [pivot.id]
  });
  const upper = graph.append({
    id: 'lu_upper',
    operation: 'matrix_lu',
    rule: 'lu_upper_triangular',
    input: 'Compute upper triangular matrix U',
    output: formatMatrix(U),
    explanation: 'U is upper triangular, result of Gaussian elimination',
    dependencies: [pivot.id]
  });

  if (!matricesEqual(matMul(P, m), matMul(L, U))) {
    throw new AlgebraError('LU decomposition failed verification: PA differs from LU');
  }
  graph.append({
    id: 'lu_verify',
    operation: 'matrix_lu',
    rule: 'lu_verification',
    input: 'Verify PA = LU',
    output: 'Decomposition verified',
    explanation: 'Multiplying L and U gives PA, confirming correct decomposition',
    dependencies: [lower.id, upper.id]
  });

  const explanation = `LU decomposition of ${n}×${n} matrix: PA = LU`;
  return {
    output: JSON.stringify({ P: toCells(P), L: toCells(L), U: toCells(U) }),
    explanation,
    metadata: explanations(
      explanation,
      'LU decomposition factors a matrix into lower and upper triangular matrices. ' +
        'This is useful for solving systems of linear equations efficiently, ' +
        'computing determinants (det(A) = det(L)·det(U)), and matrix inversion. ' +
        'Partial pivoting (permutation matrix P) ensures numerical stability by ' +
        'choosing the largest pivot element at each step. ' +
        'Once computed, LU decomposition can be reused to solve Ax = b for multiple right-hand sides.'
    )
  };
});

export const linalgRules: readonly StructuredRule[] = [
  matrixMultiply,
  matrixDeterminant,
  matrixInverse,
  matrixRref,
  matrixEigenvalues,
  matrixLu
];
