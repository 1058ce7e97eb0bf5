import type { OutputDescriptor } from "../schemas/output.js";
import type { FieldConfig, FieldKind } from "../schemas/field-config.js";
import { DimensionError, InvalidValueError } from "./errors.js";

/**
 * A scalar or an arbitrarily nested numeric array (a row, a batch of rows, ...)
 */
export type NumericArray = number | readonly NumericArray[];

/**
 * Codec between one column's native domain and a fixed-width numeric encoding.
 *
 * Implementations are immutable after construction, so a single instance can
 * be shared across callers without synchronization.
 */
export interface Field<TRaw, TEncoded> {
  readonly kind: FieldKind;
  /** Column identifier; unique within a FieldSchema, never interpreted by the field */
  readonly name: string;
  /** Number of numeric slots one encoded sample occupies */
  readonly width: number;

  normalize(value: TRaw): TEncoded;
  denormalize(encoded: TEncoded): TRaw;
  describe(): OutputDescriptor | readonly OutputDescriptor[];
  /** Plain construction config, suitable for persisting with a trained model */
  toConfig(): FieldConfig;
}

function isNumberRow(values: readonly NumericArray[]): values is readonly number[] {
  return values.every((v) => typeof v === "number");
}

function isNestedRows(values: readonly NumericArray[]): values is readonly (readonly NumericArray[])[] {
  return values.every((v) => Array.isArray(v));
}

/**
 * Apply `fn` element-wise, checking that the trailing dimension equals `width`.
 * A bare number counts as a trailing dimension of 1. Output mirrors input shape.
 */
export function mapTrailing(
  x: NumericArray,
  width: number,
  field: string,
  fn: (value: number) => number
): NumericArray {
  if (typeof x === "number") {
    if (width !== 1) {
      throw new DimensionError(1, width, field);
    }
    return fn(x);
  }

  const raw: unknown = x;
  if (!Array.isArray(raw)) {
    throw new InvalidValueError(`Expected a number or an array, got ${typeof raw}`, field);
  }

  if (isNumberRow(x)) {
    if (x.length !== width) {
      throw new DimensionError(x.length, width, field);
    }
    return x.map(fn);
  }

  if (isNestedRows(x)) {
    return x.map((row) => mapTrailing(row, width, field, fn));
  }

  throw new InvalidValueError("Ragged input: rows mix scalars and arrays", field);
}

/**
 * Index of the largest entry; ties resolve to the lowest index.
 */
export function argmax(row: readonly number[], field: string): number {
  let best = 0;
  for (let i = 0; i < row.length; i++) {
    const value = row[i];
    if (typeof value !== "number" || Number.isNaN(value)) {
      throw new InvalidValueError(`Entry ${i} is not a number`, field);
    }
    if (value > row[best]) {
      best = i;
    }
  }
  return best;
}
