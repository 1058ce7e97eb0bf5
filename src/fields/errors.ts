/**
 * Typed errors raised by field codecs.
 *
 * All of them are programming or configuration errors: they are thrown
 * synchronously to the caller and never retried. `code` is stable and is
 * what `toErrorV1()` surfaces to pipeline callers.
 */

export type FieldErrorCode =
  | "DIMENSION_MISMATCH"
  | "INVALID_CONFIG"
  | "OUT_OF_RANGE"
  | "LENGTH_MISMATCH"
  | "DEGENERATE_RANGE"
  | "INVALID_VALUE";

export abstract class FieldError extends Error {
  abstract readonly code: FieldErrorCode;

  constructor(
    message: string,
    /** Name of the field that raised the error, when known */
    public readonly field?: string
  ) {
    super(field ? `${field}: ${message}` : message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Trailing dimension of an input does not match the field's declared width.
 */
export class DimensionError extends FieldError {
  readonly name = "DimensionError";
  readonly code = "DIMENSION_MISMATCH";

  constructor(
    public readonly actual: number,
    public readonly expected: number,
    field?: string
  ) {
    super(`Dimension is ${actual}. Expected dimension is ${expected}`, field);
  }
}

/**
 * Unsupported normalization, malformed vocabulary, bad widths, or a schema
 * that fails validation.
 */
export class InvalidConfigError extends FieldError {
  readonly name = "InvalidConfigError";
  readonly code = "INVALID_CONFIG";

  constructor(
    message: string,
    field?: string,
    /** Validation issues, when the failure came from schema parsing */
    public readonly issues?: Record<string, unknown>
  ) {
    super(message, field);
  }
}

/**
 * Integer outside the domain a BitField can represent.
 */
export class BitRangeError extends FieldError {
  readonly name = "BitRangeError";
  readonly code = "OUT_OF_RANGE";

  constructor(
    public readonly value: number,
    public readonly numBits: number,
    field?: string
  ) {
    super(`Value ${value} is not an integer in [0, 2^${numBits})`, field);
  }
}

/**
 * Encoded bit array has the wrong length.
 */
export class LengthError extends FieldError {
  readonly name = "LengthError";
  readonly code = "LENGTH_MISMATCH";

  constructor(
    public readonly actual: number,
    public readonly expected: number,
    field?: string
  ) {
    super(`Bit array length is ${actual}. Expected length is ${expected}`, field);
  }
}

/**
 * Continuous range with max == min: scaling would divide by zero.
 */
export class ArithmeticError extends FieldError {
  readonly name = "ArithmeticError";
  readonly code = "DEGENERATE_RANGE";

  constructor(
    public readonly minValue: number,
    public readonly maxValue: number,
    field?: string
  ) {
    super(`Degenerate range: min (${minValue}) equals max (${maxValue})`, field);
  }
}

/**
 * Encoded input contains entries that are not usable numbers (NaN, strings).
 */
export class InvalidValueError extends FieldError {
  readonly name = "InvalidValueError";
  readonly code = "INVALID_VALUE";
}

export function isFieldError(error: unknown): error is FieldError {
  return error instanceof FieldError;
}
