/**
 * Field codecs
 *
 * One Field per dataset column: normalize raw values into model-ready
 * numeric vectors, denormalize model output back into native values.
 */

export { ContinuousField, type ContinuousFieldOptions } from "./continuous.js";
export { DiscreteField, type DiscreteFieldOptions, type OneHotRow, type OneHotBatch } from "./discrete.js";
export { BitField, type BitFieldOptions } from "./bit.js";
export { createField, parseFieldConfig, fieldConfigOf, type AnyField } from "./factory.js";
export { FieldSchema, type SchemaEntry, type FieldOffset } from "./schema.js";
export { mapTrailing, argmax, type Field, type NumericArray } from "./field.js";
export {
  FieldError,
  DimensionError,
  InvalidConfigError,
  BitRangeError,
  LengthError,
  ArithmeticError,
  InvalidValueError,
  isFieldError,
  type FieldErrorCode,
} from "./errors.js";
