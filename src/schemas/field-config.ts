import { z } from "zod";
import { Normalization } from "./output.js";

export const FieldKind = z.enum(["continuous", "discrete", "bit"]);
export type FieldKind = z.infer<typeof FieldKind>;

/**
 * Category labels a DiscreteField can hold
 */
export const Category = z.union([z.string(), z.number(), z.boolean()]);
export type Category = z.infer<typeof Category>;

/** Widest BitField whose whole domain stays within Number.MAX_SAFE_INTEGER */
export const MAX_BITS = 53;

const FieldName = z.string().trim().min(1);

export const ContinuousFieldConfig = z.object({
  type: z.literal(FieldKind.enum.continuous),
  name: FieldName,
  min: z.number().finite(),
  max: z.number().finite(),
  normalization: Normalization,
  width: z.number().int().positive().default(1),
});

export const DiscreteFieldConfig = z.object({
  type: z.literal(FieldKind.enum.discrete),
  name: FieldName,
  vocabulary: z
    .array(Category)
    .min(1)
    .refine((choices) => new Set(choices).size === choices.length, {
      message: "Vocabulary must not contain duplicates",
    }),
  strictWidth: z.boolean().optional(),
});

export const BitFieldConfig = z.object({
  type: z.literal(FieldKind.enum.bit),
  name: FieldName,
  numBits: z.number().int().min(1).max(MAX_BITS),
});

/**
 * Plain, serialisable description of one schema column.
 *
 * Accepted by createField(); returned by Field.toConfig().
 */
export const FieldConfigSchema = z.discriminatedUnion("type", [
  ContinuousFieldConfig,
  DiscreteFieldConfig,
  BitFieldConfig,
]);

export type ContinuousFieldConfigT = z.infer<typeof ContinuousFieldConfig>;
export type DiscreteFieldConfigT = z.infer<typeof DiscreteFieldConfig>;
export type BitFieldConfigT = z.infer<typeof BitFieldConfig>;
export type FieldConfig = z.infer<typeof FieldConfigSchema>;
/** Config as written by callers, before defaults are applied */
export type FieldConfigInput = z.input<typeof FieldConfigSchema>;
