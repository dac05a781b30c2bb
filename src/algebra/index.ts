/**
 * Algebra backend
 *
 * Exact symbolic arithmetic used by the rule library: parsing, canonical
 * construction, printing, differentiation, simplification, expansion,
 * factoring and matrix algorithms.
 */

// Trees and construction
export type {
  Expression,
  NumberNode,
  SymbolNode,
  AddNode,
  MulNode,
  PowNode,
  CallNode,
  HoleNode
} from './AST.js';
export { CONSTANT_SYMBOLS, num, sym, hole, ZERO, ONE, MINUS_ONE, HALF, PI, E, isZero, isOne, isNumber, integerValue } from './AST.js';
export { add, mul, pow, call, neg, sub, div, keepCoefficient, splitCoefficient } from './Canonical.js';
export { Rational } from './Rational.js';

// Text
export { Parser, parseExpression } from './Parser.js';
export { Lexer, TokenType, tokenize } from './Lexer.js';
export type { Token } from './Lexer.js';
export { print, printKey, isNegativeTerm } from './Printer.js';
export type { PrintOptions } from './Printer.js';

// Queries and traversal
export { equals, freeSymbols, dependsOn, preorder, children, rebuild, bottomUp, substituteHoles, holeIds, size } from './Inspect.js';

// Operations
export { differentiate, nthDerivative, outerDerivative } from './Differentiate.js';
export { integrate, definiteIntegral, substitute } from './Integrate.js';
export { expand } from './Expand.js';
export { factor } from './Factor.js';
export { simplify, cancelCommonFactors } from './Simplify.js';
export { trigSimplify } from './Trig.js';
export { toPolynomial, fromPolynomial, rationalRoots, quadraticRoots, sqrtRational } from './Polynomial.js';
export type { Polynomial, RationalRoot } from './Polynomial.js';

// Matrices
export {
  parseMatrix,
  formatMatrix,
  formatCell,
  toCells,
  shape,
  describeShape,
  requireSquare,
  identity,
  transpose,
  matricesEqual,
  dotTerms,
  matMul,
  minor,
  determinant,
  cofactor,
  adjugate,
  scale,
  inverse,
  rowReduce,
  luDecompose,
  characteristicPolynomial,
  characteristicExpression,
  eigenvalues,
  eigenvectors,
  nullspace,
  toRationalMatrix
} from './Matrix.js';
export type { Matrix, MatrixCell, RowOperation, LuDecomposition, LuColumnStep, Eigenvalue } from './Matrix.js';

// Errors
export {
  ParseError,
  AlgebraError,
  AlgebraInputError,
  MatrixFormatError,
  DimensionError,
  NonSquareMatrixError,
  SingularMatrixError,
  UnsupportedError
} from './Errors.js';
