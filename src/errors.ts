export const SIMPLEX_ERROR_CODES = {
  /** Bad argument or option, detected before any evaluation */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  /** Vector length differs from the problem dimension */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Vertex index outside 0..d */
  INDEX_OUT_OF_RANGE: 'INDEX_OUT_OF_RANGE',
  /** Objective returned NaN or ±Infinity */
  NON_FINITE_SCORE: 'NON_FINITE_SCORE',
} as const;

export type SimplexErrorCode = typeof SIMPLEX_ERROR_CODES[keyof typeof SIMPLEX_ERROR_CODES];

export class SimplexError extends Error {
  readonly name = 'SimplexError';

  constructor(
    public readonly code: SimplexErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(`[${code}] ${message}`);
  }
}

export function validationError(message: string, details?: unknown): SimplexError {
  return new SimplexError('VALIDATION_ERROR', message, details);
}

export function dimensionMismatchError(expected: number, received: number): SimplexError {
  return new SimplexError(
    'DIMENSION_MISMATCH',
    `Expected a vector of length ${expected}, got ${received}`,
    { expected, received }
  );
}

export function indexOutOfRangeError(index: number, size: number): SimplexError {
  return new SimplexError(
    'INDEX_OUT_OF_RANGE',
    `Vertex index ${index} is outside 0..${size - 1}`,
    { index, size }
  );
}

export function nonFiniteScoreError(x: number[], score: number): SimplexError {
  return new SimplexError(
    'NON_FINITE_SCORE',
    `Objective returned ${score} at [${x.join(', ')}]`,
    { x: x.slice(), score }
  );
}
