export class ParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public column: number,
    public token?: string
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * Failure inside a backend computation
 */
export class AlgebraError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AlgebraError';
  }
}

/**
 * Backend failure caused by the caller's input rather than by the backend itself
 */
export class AlgebraInputError extends AlgebraError {
  constructor(message: string) {
    super(message);
    this.name = 'AlgebraInputError';
  }
}

export class MatrixFormatError extends AlgebraInputError {
  constructor(
    message: string,
    public source: string
  ) {
    super(message);
    this.name = 'MatrixFormatError';
  }
}

export class DimensionError extends AlgebraInputError {
  constructor(
    message: string,
    public left: readonly [number, number],
    public right?: readonly [number, number]
  ) {
    super(message);
    this.name = 'DimensionError';
  }
}

export class NonSquareMatrixError extends AlgebraInputError {
  constructor(
    public operation: string,
    public rows: number,
    public cols: number
  ) {
    super(
      `${operation} requires a square matrix. Got ${rows}×${cols} matrix. ` +
        'The matrix must have the same number of rows and columns.'
    );
    this.name = 'NonSquareMatrixError';
  }
}

export class SingularMatrixError extends AlgebraInputError {
  constructor(public determinant: string) {
    super(
      `Matrix is singular (determinant = ${determinant}) and cannot be inverted. ` +
        'A matrix must have a non-zero determinant to be invertible.'
    );
    this.name = 'SingularMatrixError';
  }
}

/**
 * The backend has no closed form for the request
 */
export class UnsupportedError extends AlgebraError {
  constructor(
    message: string,
    public construct?: string
  ) {
    const detail = construct ? ` (${construct})` : '';
    super(`${message}${detail}`);
    this.name = 'UnsupportedError';
  }
}
