import { ZodError } from "zod";
import {
  BitRangeError,
  DimensionError,
  FieldError,
  InvalidConfigError,
  LengthError,
  type FieldErrorCode,
} from "../fields/errors.js";

/**
 * Error codes for structured error payloads
 */
export type ErrorCode = FieldErrorCode | "BAD_INPUT" | "INTERNAL";

/**
 * Structured error payload (error.v1 schema)
 *
 * Handed to pipeline callers that decide whether to abort or skip the
 * affected column.
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  field?: string;
  details?: Record<string, unknown>;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  field?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (field) {
    error.field = field;
  }

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

export function zodErrorToErrorV1(error: ZodError, field?: string): ErrorV1 {
  return buildErrorV1("BAD_INPUT", "Validation failed", { validation_errors: error.flatten() }, field);
}

/**
 * Strip file paths and email addresses from free-form messages
 */
function sanitizeMessage(message: string): string {
  return message.replace(/\/[\w/.@-]+/g, "[path]").replace(/[\w.-]+@[\w.-]+\.\w+/g, "[email]");
}

function detailsOf(error: FieldError): Record<string, unknown> | undefined {
  if (error instanceof DimensionError || error instanceof LengthError) {
    return { actual: error.actual, expected: error.expected };
  }
  if (error instanceof BitRangeError) {
    return { num_bits: error.numBits };
  }
  if (error instanceof InvalidConfigError) {
    return error.issues;
  }
  return undefined;
}

/**
 * Convert any thrown value to ErrorV1 (never leaks stack traces)
 *
 * @param error The error to convert
 * @param field Column the caller was processing, if the error does not name one
 */
export function toErrorV1(error: unknown, field?: string): ErrorV1 {
  if (error instanceof FieldError) {
    return buildErrorV1(error.code, error.message, detailsOf(error), error.field ?? field);
  }

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, field);
  }

  if (error instanceof Error) {
    const message = sanitizeMessage(error.message || "An unexpected error occurred");
    return buildErrorV1("INTERNAL", message, undefined, field);
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeMessage(error), undefined, field);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, field);
}
