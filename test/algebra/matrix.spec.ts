import { describe, it, expect } from 'vitest';
import {
  parseMatrix,
  formatMatrix,
  determinant,
  matMul,
  inverse,
  adjugate,
  rowReduce,
  luDecompose,
  matricesEqual,
  characteristicExpression,
  eigenvalues,
  eigenvectors,
  nullspace,
  toCells
} from '../../src/algebra/Matrix.js';
import { print } from '../../src/algebra/Printer.js';
import { num } from '../../src/algebra/AST.js';
import {
  DimensionError,
  MatrixFormatError,
  NonSquareMatrixError,
  SingularMatrixError
} from '../../src/algebra/Errors.js';

const A = parseMatrix('[[1,2],[3,4]]');

describe('Matrix Backend', () => {
  describe('parseMatrix', () => {
    it('should accept numbers and expression strings', () => {
      const m = parseMatrix('[[1, "a"], [0.5, "2*b"]]');
      expect(formatMatrix(m)).toBe('[[1,"a"],[0.5,"2*b"]]');
    });

    it('should reject malformed input', () => {
      expect(() => parseMatrix('[[1,2],[3]]')).toThrow(MatrixFormatError);
      expect(() => parseMatrix('[]')).toThrow('expected a non-empty list of rows');
      expect(() => parseMatrix('not json')).toThrow(MatrixFormatError);
      expect(() => parseMatrix('[[true]]')).toThrow('unsupported entry true');
    });
  });

  describe('Arithmetic', () => {
    it('should multiply', () => {
      expect(formatMatrix(matMul(A, parseMatrix('[[5,6],[7,8]]')))).toBe('[[19,22],[43,50]]');
    });

    it('should refuse mismatched shapes', () => {
      const wide = parseMatrix('[[1,2,3],[4,5,6]]');
      expect(() => matMul(wide, A)).toThrow(DimensionError);
      expect(() => matMul(wide, A)).toThrow(
        'Cannot multiply matrices: A is 2×3, B is 2×2. Number of columns in A (3) must equal number of rows in B (2).'
      );
    });

    it('should compute determinants', () => {
      expect(print(determinant(A))).toBe('-2');
      expect(print(determinant(parseMatrix('[[2,0,1],[1,3,2],[1,1,2]]')))).toBe('6');
      expect(print(determinant(parseMatrix('[["a","b"],["c","d"]]')))).toBe('a*d - b*c');
    });

    it('should require square matrices for determinants', () => {
      expect(() => determinant(parseMatrix('[[1,2,3]]'))).toThrow(NonSquareMatrixError);
    });

    it('should invert', () => {
      expect(formatMatrix(inverse(parseMatrix('[[2,1],[1,1]]')))).toBe('[[1,-1],[-1,2]]');
      expect(formatMatrix(inverse(parseMatrix('[[4,7],[2,6]]')))).toBe('[[0.6,-0.7],[-0.2,0.4]]');
      expect(formatMatrix(adjugate(parseMatrix('[[4,7],[2,6]]')))).toBe('[[6,-7],[-2,4]]');
    });

    it('should refuse singular matrices', () => {
      expect(() => inverse(parseMatrix('[[1,2],[2,4]]'))).toThrow(SingularMatrixError);
      expect(() => inverse(parseMatrix('[[1,2],[2,4]]'))).toThrow('determinant = 0');
    });
  });

  describe('Row reduction', () => {
    it('should reach the identity for an invertible matrix', () => {
      const { result, operations, pivotColumns } = rowReduce(A);
      expect(formatMatrix(result)).toBe('[[1,0],[0,1]]');
      expect(operations.map(op => op.kind)).toEqual(['eliminate', 'scale', 'eliminate']);
      expect(pivotColumns).toEqual([0, 1]);
    });

    it('should swap a zero pivot away', () => {
      const { result, operations } = rowReduce(parseMatrix('[[0,1],[1,0]]'));
      expect(operations[0].kind).toBe('swap');
      expect(formatMatrix(result)).toBe('[[1,0],[0,1]]');
    });

    it('should find a null space basis', () => {
      expect(formatMatrix(nullspace(parseMatrix('[[1,2],[2,4]]')))).toBe('[[-2,1]]');
    });
  });

  describe('LU decomposition', () => {
    it('should pivot on the largest entry and satisfy PA = LU', () => {
      const { P, L, U, steps } = luDecompose(A);
      expect(toCells(P)).toEqual([
        [0, 1],
        [1, 0]
      ]);
      expect(toCells(U)[0]).toEqual([3, 4]);
      expect(print(U[1][1])).toBe('2/3');
      expect(print(L[1][0])).toBe('1/3');
      expect(steps.map(s => s.swapped)).toEqual([true, false]);
      expect(matricesEqual(matMul(P, A), matMul(L, U))).toBe(true);
    });
  });

  describe('Eigenvalues', () => {
    it('should build the characteristic polynomial', () => {
      expect(print(characteristicExpression(A))).toBe('lambda**2 - 5*lambda - 2');
    });

    it('should find rational eigenvalues and their eigenvectors', () => {
      const m = parseMatrix('[[2,0],[0,3]]');
      expect(eigenvalues(m).map(e => [print(e.value), e.multiplicity])).toEqual([
        ['2', 1],
        ['3', 1]
      ]);
      expect(formatMatrix(eigenvectors(m, num(2)))).toBe('[[1,0]]');
    });

    it('should find irrational eigenvalues in closed form', () => {
      expect(eigenvalues(A).map(e => print(e.value))).toEqual(['-sqrt(33)/2 + 5/2', 'sqrt(33)/2 + 5/2']);
    });

    it('should report repeated eigenvalues once with their multiplicity', () => {
      const values = eigenvalues(parseMatrix('[[1,0],[0,1]]'));
      expect(values.map(e => [print(e.value), e.multiplicity])).toEqual([['1', 2]]);
    });
  });
});
