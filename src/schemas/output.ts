import { z } from "zod";

/**
 * Kind of sub-tensor a field contributes to the model output.
 */
export const OutputType = z.enum(["CONTINUOUS", "DISCRETE"]);

/**
 * Target interval for continuous range scaling.
 * - ZERO_ONE: [0, 1]
 * - MINUSONE_ONE: [-1, 1]
 */
export const Normalization = z.enum(["ZERO_ONE", "MINUSONE_ONE"]);

export type OutputTypeT = z.infer<typeof OutputType>;
export type NormalizationT = z.infer<typeof Normalization>;

const ContinuousOutput = z.object({
  kind: z.literal(OutputType.enum.CONTINUOUS),
  width: z.number().int().positive(),
  normalization: Normalization,
});

const DiscreteOutput = z.object({
  kind: z.literal(OutputType.enum.DISCRETE),
  width: z.number().int().positive(),
});

/**
 * Shape metadata for one encoded channel, consumed at model-construction time.
 * `normalization` only exists on continuous channels.
 */
export const OutputDescriptorSchema = z.discriminatedUnion("kind", [ContinuousOutput, DiscreteOutput]);

export type ContinuousOutputDescriptor = Readonly<z.infer<typeof ContinuousOutput>>;
export type DiscreteOutputDescriptor = Readonly<z.infer<typeof DiscreteOutput>>;
export type OutputDescriptor = ContinuousOutputDescriptor | DiscreteOutputDescriptor;

export function continuousOutput(width: number, normalization: NormalizationT): ContinuousOutputDescriptor {
  return Object.freeze({ kind: OutputType.enum.CONTINUOUS, width, normalization });
}

export function discreteOutput(width: number): DiscreteOutputDescriptor {
  return Object.freeze({ kind: OutputType.enum.DISCRETE, width });
}

/**
 * Sum of slot widths across descriptors (for sizing a concatenated output head)
 */
export function totalOutputWidth(descriptors: readonly OutputDescriptor[]): number {
  return descriptors.reduce((sum, d) => sum + d.width, 0);
}
