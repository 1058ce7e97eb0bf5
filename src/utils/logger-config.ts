/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 *
 * Raw column values can carry personal data (categorical labels are often
 * names, emails or identifiers). Codec code logs hashes instead; these paths
 * catch anything that slips through from callers.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Raw column values
  "rawValue",
  "*.rawValue",
  "category",
  "*.category",
  "vocabulary",
  "*.vocabulary",

  // Secrets that may ride along in caller-supplied context
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.authorization",

  // PII fields
  "*.email",
  "*.phone",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
