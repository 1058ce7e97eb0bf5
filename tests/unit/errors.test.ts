/**
 * Structured Error Payload Tests
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { toErrorV1 } from "../../src/utils/errors.js";
import {
  ArithmeticError,
  BitRangeError,
  DimensionError,
  InvalidConfigError,
  InvalidValueError,
  LengthError,
  isFieldError,
} from "../../src/fields/errors.js";

describe("toErrorV1", () => {
  it("carries the code, field and dimensions of a DimensionError", () => {
    expect(toErrorV1(new DimensionError(1, 2, "temperature"))).toEqual({
      schema: "error.v1",
      code: "DIMENSION_MISMATCH",
      message: "temperature: Dimension is 1. Expected dimension is 2",
      field: "temperature",
      details: { actual: 1, expected: 2 },
    });
  });

  it("maps a LengthError", () => {
    expect(toErrorV1(new LengthError(7, 8, "flags"))).toEqual({
      schema: "error.v1",
      code: "LENGTH_MISMATCH",
      message: "flags: Bit array length is 7. Expected length is 8",
      field: "flags",
      details: { actual: 7, expected: 8 },
    });
  });

  it("maps a BitRangeError", () => {
    expect(toErrorV1(new BitRangeError(8, 3, "port_class"))).toEqual({
      schema: "error.v1",
      code: "OUT_OF_RANGE",
      message: "port_class: Value 8 is not an integer in [0, 2^3)",
      field: "port_class",
      details: { num_bits: 3 },
    });
  });

  it("maps an ArithmeticError without details", () => {
    expect(toErrorV1(new ArithmeticError(2, 2, "flat"))).toEqual({
      schema: "error.v1",
      code: "DEGENERATE_RANGE",
      message: "flat: Degenerate range: min (2) equals max (2)",
      field: "flat",
    });
  });

  it("attaches validation issues of an InvalidConfigError", () => {
    const payload = toErrorV1(new InvalidConfigError("bad", "protocol", { validation_errors: { formErrors: [] } }));

    expect(payload.code).toBe("INVALID_CONFIG");
    expect(payload.details).toEqual({ validation_errors: { formErrors: [] } });
  });

  it("falls back to the caller's field name", () => {
    expect(toErrorV1(new InvalidValueError("Entry 0 is not a number"), "grade")).toEqual({
      schema: "error.v1",
      code: "INVALID_VALUE",
      message: "Entry 0 is not a number",
      field: "grade",
    });
  });

  it("maps zod errors to BAD_INPUT", () => {
    const result = z.object({ width: z.number() }).safeParse({ width: "2" });
    if (result.success) throw new Error("expected parse failure");

    const payload = toErrorV1(result.error);

    expect(payload.code).toBe("BAD_INPUT");
    expect(payload.message).toBe("Validation failed");
    expect(payload.details?.validation_errors).toEqual(result.error.flatten());
  });

  it("sanitizes paths from generic errors", () => {
    expect(toErrorV1(new Error("failed at /srv/data/columns.csv"))).toEqual({
      schema: "error.v1",
      code: "INTERNAL",
      message: "failed at [path]",
    });
  });

  it("sanitizes emails from string errors", () => {
    expect(toErrorV1("owner ops@example.com rejected").message).toBe("owner [email] rejected");
  });

  it("returns a generic payload for unknown values", () => {
    expect(toErrorV1(42)).toEqual({
      schema: "error.v1",
      code: "INTERNAL",
      message: "An unexpected error occurred",
    });
  });
});

describe("field errors", () => {
  it("are recognised as field errors and as Error instances", () => {
    const error = new DimensionError(3, 2);

    expect(isFieldError(error)).toBe(true);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("DimensionError");
    expect(error.field).toBeUndefined();
    expect(error.message).toBe("Dimension is 3. Expected dimension is 2");
  });

  it("does not treat plain errors as field errors", () => {
    expect(isFieldError(new Error("x"))).toBe(false);
  });
});
