import { ZodError } from "zod";
import { FieldConfigSchema, type FieldConfig } from "../schemas/field-config.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { BitField } from "./bit.js";
import { ContinuousField } from "./continuous.js";
import { DiscreteField } from "./discrete.js";
import { InvalidConfigError } from "./errors.js";

export type AnyField = ContinuousField | DiscreteField | BitField;

function fieldNameOf(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "name" in raw && typeof raw.name === "string") {
    return raw.name;
  }
  return undefined;
}

/**
 * Validate a plain config object. Zod failures surface as InvalidConfigError
 * with the flattened issues attached.
 */
export function parseFieldConfig(raw: unknown): FieldConfig {
  try {
    return FieldConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new InvalidConfigError("Field config failed validation", fieldNameOf(raw), {
        validation_errors: error.flatten(),
      });
    }
    throw error;
  }
}

function buildField(cfg: FieldConfig): AnyField {
  switch (cfg.type) {
    case "continuous":
      return ContinuousField.fromConfig(cfg);
    case "discrete":
      return DiscreteField.fromConfig(cfg);
    case "bit":
      return BitField.fromConfig(cfg);
  }
}

/**
 * Build the field variant a config describes.
 */
export function createField(raw: unknown): AnyField {
  const field = buildField(parseFieldConfig(raw));
  emit(TelemetryEvents.FieldCreated, { field: field.name, kind: field.kind, width: field.width });
  return field;
}

/**
 * Plain config of an existing field, e.g. for persisting next to a model.
 */
export function fieldConfigOf(field: AnyField): FieldConfig {
  return field.toConfig();
}
