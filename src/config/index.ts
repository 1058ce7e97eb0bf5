/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables that tune the
 * codec layer. Invalid configurations fail on first access.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional host name that treats empty strings as unset
 */
const optionalHost = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  runtime: z.object({
    logLevel: LogLevel.default("info"),
  }),

  codec: z.object({
    discreteStrictWidth: booleanString.default(true), // Reject decode rows whose width differs from the vocabulary
    reportOutOfRange: booleanString.default(true), // Emit telemetry when continuous input falls outside [min, max]
    reportUnknownCategory: booleanString.default(true), // Emit telemetry when a category encodes to a zero row
  }),

  metrics: z.object({
    statsdHost: optionalHost,
    statsdPort: z.coerce.number().int().positive().default(8125),
    prefix: z.string().default("field_codec."),
    mock: booleanString.default(false), // Buffer metrics in memory instead of sending UDP
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      logLevel: env.LOG_LEVEL,
    },
    codec: {
      discreteStrictWidth: env.FIELD_DISCRETE_STRICT_WIDTH,
      reportOutOfRange: env.FIELD_REPORT_OUT_OF_RANGE,
      reportUnknownCategory: env.FIELD_REPORT_UNKNOWN_CATEGORY,
    },
    metrics: {
      statsdHost: env.STATSD_HOST,
      statsdPort: env.STATSD_PORT,
      prefix: env.STATSD_PREFIX,
      mock: env.STATSD_MOCK,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so tests can set environment
 * variables before the config is read. Parsed once, cached thereafter.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
