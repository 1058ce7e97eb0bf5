import { discreteOutput, type DiscreteOutputDescriptor } from "../schemas/output.js";
import { Category, type DiscreteFieldConfigT } from "../schemas/field-config.js";
import { config } from "../config/index.js";
import { hashCategory } from "../utils/hash.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { DimensionError, InvalidConfigError } from "./errors.js";
import { argmax, type Field } from "./field.js";

/** Cap on distinct hashes attached to one unknown-category event */
const MAX_REPORTED_HASHES = 10;

export type OneHotRow = readonly number[];
export type OneHotBatch = readonly OneHotRow[];

export interface DiscreteFieldOptions<T extends Category> {
  name: string;
  /** Ordered, distinct labels; order fixes the one-hot column order */
  vocabulary: readonly T[];
  /**
   * Reject decode rows whose width differs from the vocabulary size.
   * Defaults to FIELD_DISCRETE_STRICT_WIDTH (true).
   */
  strictWidth?: boolean;
}

function isBatch(encoded: OneHotRow | OneHotBatch): encoded is OneHotBatch {
  if (encoded.length === 0) return false;
  for (const row of encoded) {
    if (!Array.isArray(row)) return false;
  }
  return true;
}

/**
 * Categorical one-hot codec over a fixed vocabulary.
 *
 * Unknown categories encode to an all-zero row instead of failing. Decoding
 * takes the arg-max, so it always returns some vocabulary entry, including
 * for all-zero rows.
 */
export class DiscreteField<T extends Category = Category>
  implements Field<Category | readonly Category[], OneHotRow | OneHotBatch>
{
  readonly kind = "discrete";
  readonly name: string;
  readonly vocabulary: readonly T[];
  readonly width: number;
  readonly strictWidth: boolean;
  private readonly index: ReadonlyMap<Category, number>;

  constructor(options: DiscreteFieldOptions<T>) {
    const { name, vocabulary } = options;

    // Config may come from untyped JSON
    const raw: unknown = vocabulary;
    if (!Array.isArray(raw)) {
      throw new InvalidConfigError("Vocabulary should be a list", name);
    }
    if (vocabulary.length === 0) {
      throw new InvalidConfigError("Vocabulary must not be empty", name);
    }
    if (!vocabulary.every((choice) => Category.safeParse(choice).success)) {
      throw new InvalidConfigError("Vocabulary entries must be strings, numbers or booleans", name);
    }

    const index = new Map<Category, number>();
    vocabulary.forEach((choice, i) => index.set(choice, i));
    if (index.size !== vocabulary.length) {
      throw new InvalidConfigError("Vocabulary must not contain duplicates", name);
    }

    this.name = name;
    this.vocabulary = Object.freeze([...vocabulary]);
    this.width = vocabulary.length;
    this.strictWidth = options.strictWidth ?? config.codec.discreteStrictWidth;
    this.index = index;

    log.debug({ field: name, kind: this.kind, width: this.width }, "Discrete field created");
  }

  static fromConfig(cfg: DiscreteFieldConfigT): DiscreteField {
    return new DiscreteField({ name: cfg.name, vocabulary: cfg.vocabulary, strictWidth: cfg.strictWidth });
  }

  normalize(value: Category): number[];
  normalize(values: readonly Category[]): number[][];
  normalize(input: Category | readonly Category[]): number[] | number[][];
  normalize(input: Category | readonly Category[]): number[] | number[][] {
    const unknown = new Set<string>();
    let unknownCount = 0;

    const encode = (value: Category): number[] => {
      const row = new Array<number>(this.width).fill(0);
      const position = this.index.get(value);
      if (position === undefined) {
        unknownCount++;
        if (unknown.size < MAX_REPORTED_HASHES) unknown.add(hashCategory(value));
      } else {
        row[position] = 1;
      }
      return row;
    };

    const result = isCategoryList(input) ? input.map(encode) : encode(input);

    if (unknownCount > 0 && config.codec.reportUnknownCategory) {
      emit(TelemetryEvents.FieldUnknownCategory, {
        field: this.name,
        count: unknownCount,
        value_hashes: [...unknown],
      });
    }

    return result;
  }

  denormalize(row: OneHotRow): T;
  denormalize(rows: OneHotBatch): T[];
  denormalize(encoded: OneHotRow | OneHotBatch): T | T[];
  denormalize(encoded: OneHotRow | OneHotBatch): T | T[] {
    if (isBatch(encoded)) {
      return encoded.map((row) => this.decodeRow(row));
    }
    return this.decodeRow(encoded);
  }

  describe(): DiscreteOutputDescriptor {
    return discreteOutput(this.width);
  }

  toConfig(): DiscreteFieldConfigT {
    return {
      type: this.kind,
      name: this.name,
      vocabulary: [...this.vocabulary],
      strictWidth: this.strictWidth,
    };
  }

  private decodeRow(row: OneHotRow): T {
    if (row.length === 0 || (this.strictWidth && row.length !== this.width)) {
      throw new DimensionError(row.length, this.width, this.name);
    }
    const position = argmax(row, this.name);
    if (position >= this.width) {
      throw new DimensionError(row.length, this.width, this.name);
    }
    return this.vocabulary[position];
  }
}

function isCategoryList(input: Category | readonly Category[]): input is readonly Category[] {
  return Array.isArray(input);
}
