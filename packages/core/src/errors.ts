/**
 * Errors raised by fixed-length array operations
 *
 * All of them are programmer errors: the library reports the condition and never
 * retries or substitutes a default.
 */

/**
 * Base class for fixed array errors
 */
export class FixedArrayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FixedArrayError';
  }
}

/**
 * Element count differs from the declared length, or two operands have different lengths
 */
export class LengthMismatchError extends FixedArrayError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly context: 'construction' | 'operand' | 'sequence',
  ) {
    super(
      context === 'construction'
        ? `Expected ${expected.toString()} elements, received ${actual.toString()}`
        : `Length mismatch in ${context}: expected ${expected.toString()}, received ${actual.toString()}`,
    );
    this.name = 'LengthMismatchError';
  }
}

/**
 * Element access outside `[0, length)`
 */
export class IndexOutOfBoundsError extends FixedArrayError {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super(`Index ${index.toString()} out of bounds for length ${length.toString()}`);
    this.name = 'IndexOutOfBoundsError';
  }
}

/**
 * Integer division or remainder with a zero divisor
 */
export class DivisionByZeroError extends FixedArrayError {
  constructor(
    public readonly dtype: string,
    public readonly operation: 'div' | 'rem',
    public readonly dividend: number | bigint,
  ) {
    super(
      `Integer ${operation === 'div' ? 'division' : 'remainder'} by zero in ${dtype}: ${dividend.toString()} / 0`,
    );
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Operands carry different element types
 */
export class DTypeMismatchError extends FixedArrayError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`DType mismatch: expected ${expected}, received ${actual}`);
    this.name = 'DTypeMismatchError';
  }
}
