/**
 * Output Descriptor Tests
 */

import { describe, it, expect } from "vitest";
import {
  continuousOutput,
  discreteOutput,
  OutputDescriptorSchema,
  totalOutputWidth,
} from "../../src/schemas/output.js";

describe("output descriptors", () => {
  it("builds frozen continuous descriptors", () => {
    const descriptor = continuousOutput(3, "MINUSONE_ONE");

    expect(descriptor).toEqual({ kind: "CONTINUOUS", width: 3, normalization: "MINUSONE_ONE" });
    expect(Object.isFrozen(descriptor)).toBe(true);
  });

  it("builds discrete descriptors without a normalization", () => {
    const descriptor = discreteOutput(2);

    expect(descriptor).toEqual({ kind: "DISCRETE", width: 2 });
    expect("normalization" in descriptor).toBe(false);
  });

  it("sums descriptor widths", () => {
    expect(totalOutputWidth([continuousOutput(1, "ZERO_ONE"), discreteOutput(4), discreteOutput(2)])).toBe(7);
  });
});

describe("OutputDescriptorSchema", () => {
  it("accepts a continuous descriptor", () => {
    const result = OutputDescriptorSchema.safeParse({ kind: "CONTINUOUS", width: 1, normalization: "ZERO_ONE" });

    expect(result.success).toBe(true);
  });

  it("requires a normalization on continuous descriptors", () => {
    expect(OutputDescriptorSchema.safeParse({ kind: "CONTINUOUS", width: 1 }).success).toBe(false);
  });

  it("rejects non-positive widths", () => {
    expect(OutputDescriptorSchema.safeParse({ kind: "DISCRETE", width: 0 }).success).toBe(false);
  });

  it("rejects unknown kinds", () => {
    expect(OutputDescriptorSchema.safeParse({ kind: "ORDINAL", width: 2 }).success).toBe(false);
  });
});
