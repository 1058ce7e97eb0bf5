import { totalOutputWidth, type OutputDescriptor } from "../schemas/output.js";
import type { FieldConfig, FieldConfigInput } from "../schemas/field-config.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { BitField } from "./bit.js";
import { ContinuousField } from "./continuous.js";
import { DiscreteField } from "./discrete.js";
import { InvalidConfigError } from "./errors.js";
import { createField, type AnyField } from "./factory.js";

export type SchemaEntry = AnyField | FieldConfigInput;

/** Slot range of one field inside the concatenated encoding, end exclusive */
export interface FieldOffset {
  name: string;
  start: number;
  end: number;
}

function isField(entry: SchemaEntry): entry is AnyField {
  return entry instanceof ContinuousField || entry instanceof DiscreteField || entry instanceof BitField;
}

/**
 * Ordered, name-unique set of fields describing one dataset's columns.
 */
export class FieldSchema {
  readonly fields: readonly AnyField[];
  readonly totalWidth: number;
  private readonly byName: ReadonlyMap<string, AnyField>;

  constructor(entries: readonly SchemaEntry[]) {
    const fields = entries.map((entry) => (isField(entry) ? entry : createField(entry)));

    const byName = new Map<string, AnyField>();
    for (const field of fields) {
      if (byName.has(field.name)) {
        throw new InvalidConfigError("Duplicate field name in schema", field.name);
      }
      byName.set(field.name, field);
    }

    this.fields = Object.freeze(fields);
    this.byName = byName;
    this.totalWidth = fields.reduce((sum, field) => sum + field.width, 0);

    emit(TelemetryEvents.FieldSchemaBuilt, {
      field_count: fields.length,
      total_width: this.totalWidth,
    });
  }

  get names(): string[] {
    return this.fields.map((field) => field.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): AnyField {
    const field = this.byName.get(name);
    if (!field) {
      throw new InvalidConfigError("Unknown field", name);
    }
    return field;
  }

  /**
   * Every field's descriptors in column order; a BitField contributes one
   * entry per bit.
   */
  describe(): OutputDescriptor[] {
    return this.fields.flatMap((field): OutputDescriptor[] => {
      const described = field.describe();
      return Array.isArray(described) ? described : [described];
    });
  }

  offsets(): FieldOffset[] {
    let start = 0;
    return this.fields.map((field) => {
      const offset = { name: field.name, start, end: start + field.width };
      start = offset.end;
      return offset;
    });
  }

  toConfig(): FieldConfig[] {
    return this.fields.map((field) => field.toConfig());
  }

  /**
   * Width of the model output head the descriptors size.
   */
  outputWidth(): number {
    return totalOutputWidth(this.describe());
  }
}
