import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { config } from "../config/index.js";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with PII redaction
 *
 * Redaction paths centralized in src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(config.runtime.logLevel));

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST=true
 */
type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config may be mid-reset in test setup
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT modify these names without updating dashboards
 */
export const TelemetryEvents = {
  FieldCreated: "field.created",
  FieldUnknownCategory: "field.unknown_category",
  FieldValueOutOfRange: "field.value_out_of_range",
  FieldSchemaBuilt: "field.schema_built",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names (for CI validation)
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * StatsD client, created on first emit when STATSD_HOST is configured
 */
let statsdClient: StatsD | null | undefined;

export function getStatsd(): StatsD | null {
  if (statsdClient === undefined) {
    const { statsdHost, statsdPort, prefix, mock } = config.metrics;
    statsdClient = statsdHost
      ? new StatsD({
          host: statsdHost,
          port: statsdPort,
          prefix,
          mock,
          errorHandler: (error: Error) => {
            log.error({ error }, "StatsD error");
          },
        })
      : null;
    if (statsdClient) {
      log.info({ statsd_host: statsdHost }, "StatsD client initialized");
    }
  }
  return statsdClient;
}

/**
 * Drop the cached StatsD client (for testing only)
 *
 * @internal
 */
export function _resetStatsd(): void {
  statsdClient?.close();
  statsdClient = undefined;
}

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetryValue = TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      // Nested arrays are dropped from telemetry payloads
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

/**
 * Emit telemetry event (logs + StatsD counter)
 *
 * Every event increments a counter named after the event, tagged with the
 * emitting field when one is given.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  const statsd = getStatsd();
  if (statsd) {
    const count = typeof eventData.count === "number" ? eventData.count : 1;
    const tags = typeof eventData.field === "string" ? { field: eventData.field } : undefined;
    statsd.increment(event, count, tags);
  }
}
