export * from "./fields/index.js";
export {
  OutputType,
  Normalization,
  OutputDescriptorSchema,
  continuousOutput,
  discreteOutput,
  totalOutputWidth,
  type OutputTypeT,
  type NormalizationT,
  type OutputDescriptor,
  type ContinuousOutputDescriptor,
  type DiscreteOutputDescriptor,
} from "./schemas/output.js";
export {
  FieldConfigSchema,
  FieldKind,
  Category,
  MAX_BITS,
  type FieldConfig,
  type FieldConfigInput,
  type ContinuousFieldConfigT,
  type DiscreteFieldConfigT,
  type BitFieldConfigT,
} from "./schemas/field-config.js";
export { toErrorV1, buildErrorV1, type ErrorV1, type ErrorCode } from "./utils/errors.js";
export { SERVICE_VERSION } from "./version.js";
