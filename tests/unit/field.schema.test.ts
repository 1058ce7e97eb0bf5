/**
 * FieldSchema Tests
 *
 * Column ordering, name lookup, descriptor flattening and slot offsets.
 */

import { describe, it, expect, afterEach } from "vitest";
import { FieldSchema } from "../../src/fields/schema.js";
import { BitField } from "../../src/fields/bit.js";
import { ContinuousField } from "../../src/fields/continuous.js";
import { InvalidConfigError } from "../../src/fields/errors.js";
import { TelemetryEvents } from "../../src/utils/telemetry.js";
import { captureTelemetry, eventsNamed, type CapturedEvent } from "../helpers/telemetry-sink.js";

function flowSchema(): FieldSchema {
  return new FieldSchema([
    new ContinuousField({ name: "bytes", minValue: 0, maxValue: 1500, normalization: "ZERO_ONE", width: 2 }),
    { type: "discrete", name: "protocol", vocabulary: ["tcp", "udp", "icmp"] },
    new BitField({ name: "dst_port", numBits: 4 }),
  ]);
}

describe("FieldSchema", () => {
  let events: CapturedEvent[] = [];
  let restore: (() => void) | undefined;

  afterEach(() => {
    restore?.();
    restore = undefined;
    events = [];
  });

  it("keeps fields in column order, accepting instances and configs", () => {
    const schema = flowSchema();

    expect(schema.names).toEqual(["bytes", "protocol", "dst_port"]);
    expect(schema.get("protocol").kind).toBe("discrete");
  });

  it("sums field widths", () => {
    expect(flowSchema().totalWidth).toBe(13);
  });

  it("flattens descriptors, one per bit for bit fields", () => {
    expect(flowSchema().describe()).toEqual([
      { kind: "CONTINUOUS", width: 2, normalization: "ZERO_ONE" },
      { kind: "DISCRETE", width: 3 },
      { kind: "DISCRETE", width: 2 },
      { kind: "DISCRETE", width: 2 },
      { kind: "DISCRETE", width: 2 },
      { kind: "DISCRETE", width: 2 },
    ]);
  });

  it("sizes the output head to the total width", () => {
    expect(flowSchema().outputWidth()).toBe(13);
  });

  it("computes the slot range of each field", () => {
    expect(flowSchema().offsets()).toEqual([
      { name: "bytes", start: 0, end: 2 },
      { name: "protocol", start: 2, end: 5 },
      { name: "dst_port", start: 5, end: 13 },
    ]);
  });

  it("rejects duplicate field names", () => {
    expect(
      () =>
        new FieldSchema([
          { type: "bit", name: "flags", numBits: 2 },
          { type: "discrete", name: "flags", vocabulary: ["on", "off"] },
        ])
    ).toThrow("flags: Duplicate field name in schema");
  });

  it("throws for an unknown name", () => {
    const schema = flowSchema();

    expect(schema.has("ttl")).toBe(false);
    expect(() => schema.get("ttl")).toThrow(InvalidConfigError);
  });

  it("exports plain configs that rebuild the same schema", () => {
    const schema = flowSchema();
    const rebuilt = new FieldSchema(schema.toConfig());

    expect(rebuilt.toConfig()).toEqual(schema.toConfig());
    expect(rebuilt.describe()).toEqual(schema.describe());
  });

  it("emits a schema event with field count and width", () => {
    ({ events, restore } = captureTelemetry());

    flowSchema();

    const built = eventsNamed(events, TelemetryEvents.FieldSchemaBuilt);
    expect(built).toHaveLength(1);
    expect(built[0].data).toEqual({ field_count: 3, total_width: 13 });
  });

  it("accepts an empty schema", () => {
    const schema = new FieldSchema([]);

    expect(schema.totalWidth).toBe(0);
    expect(schema.describe()).toEqual([]);
  });
});
