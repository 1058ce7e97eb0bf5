import { continuousOutput, Normalization, type ContinuousOutputDescriptor, type NormalizationT } from "../schemas/output.js";
import type { ContinuousFieldConfigT } from "../schemas/field-config.js";
import { config } from "../config/index.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { ArithmeticError, InvalidConfigError } from "./errors.js";
import { mapTrailing, type Field, type NumericArray } from "./field.js";

export interface ContinuousFieldOptions {
  name: string;
  minValue: number;
  maxValue: number;
  normalization: NormalizationT;
  /** Independent scalar channels encoded together (default 1) */
  width?: number;
}

/**
 * Affine range scaling of real-valued vectors.
 *
 * ZERO_ONE maps [min, max] onto [0, 1]; MINUSONE_ONE onto [-1, 1]. Values
 * outside [min, max] are extrapolated linearly, never clamped.
 */
export class ContinuousField implements Field<NumericArray, NumericArray> {
  readonly kind = "continuous";
  readonly name: string;
  readonly minValue: number;
  readonly maxValue: number;
  readonly normalization: NormalizationT;
  readonly width: number;

  constructor(options: ContinuousFieldOptions) {
    const { name, minValue, maxValue, normalization, width = 1 } = options;

    if (!Normalization.safeParse(normalization).success) {
      throw new InvalidConfigError(`Not valid normalization option: ${String(normalization)}`, name);
    }
    if (!Number.isInteger(width) || width < 1) {
      throw new InvalidConfigError(`Width must be a positive integer, got ${width}`, name);
    }
    if (!Number.isFinite(minValue) || !Number.isFinite(maxValue)) {
      throw new InvalidConfigError(`Bounds must be finite, got [${minValue}, ${maxValue}]`, name);
    }
    if (maxValue === minValue) {
      throw new ArithmeticError(minValue, maxValue, name);
    }
    if (maxValue < minValue) {
      throw new InvalidConfigError(`max (${maxValue}) must be greater than min (${minValue})`, name);
    }
    if (!Number.isFinite(maxValue - minValue)) {
      throw new InvalidConfigError(`Range [${minValue}, ${maxValue}] is too wide to scale`, name);
    }

    this.name = name;
    this.minValue = minValue;
    this.maxValue = maxValue;
    this.normalization = normalization;
    this.width = width;

    log.debug({ field: name, kind: this.kind, width, normalization }, "Continuous field created");
  }

  static fromConfig(cfg: ContinuousFieldConfigT): ContinuousField {
    return new ContinuousField({
      name: cfg.name,
      minValue: cfg.min,
      maxValue: cfg.max,
      normalization: cfg.normalization,
      width: cfg.width,
    });
  }

  normalize(x: number): number;
  normalize(x: readonly number[]): number[];
  normalize(x: readonly (readonly number[])[]): number[][];
  normalize(x: NumericArray): NumericArray;
  normalize(x: NumericArray): NumericArray {
    const min = this.minValue;
    const span = this.maxValue - min;
    let outOfRange = 0;

    const scale =
      this.normalization === Normalization.enum.ZERO_ONE
        ? (v: number) => (v - min) / span
        : (v: number) => (2 * (v - min)) / span - 1;

    const result = mapTrailing(x, this.width, this.name, (v) => {
      if (v < min || v > this.maxValue) outOfRange++;
      return scale(v);
    });

    if (outOfRange > 0 && config.codec.reportOutOfRange) {
      emit(TelemetryEvents.FieldValueOutOfRange, {
        field: this.name,
        count: outOfRange,
        min,
        max: this.maxValue,
      });
    }

    return result;
  }

  denormalize(y: number): number;
  denormalize(y: readonly number[]): number[];
  denormalize(y: readonly (readonly number[])[]): number[][];
  denormalize(y: NumericArray): NumericArray;
  denormalize(y: NumericArray): NumericArray {
    const min = this.minValue;
    const span = this.maxValue - min;

    const unscale =
      this.normalization === Normalization.enum.ZERO_ONE
        ? (v: number) => v * span + min
        : (v: number) => ((v + 1) / 2) * span + min;

    return mapTrailing(y, this.width, this.name, unscale);
  }

  describe(): ContinuousOutputDescriptor {
    return continuousOutput(this.width, this.normalization);
  }

  toConfig(): ContinuousFieldConfigT {
    return {
      type: this.kind,
      name: this.name,
      min: this.minValue,
      max: this.maxValue,
      normalization: this.normalization,
      width: this.width,
    };
  }
}
