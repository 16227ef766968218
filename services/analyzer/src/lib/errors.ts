/**
 * Error types for ingestion, storage and configuration.
 *
 * The metrics engine itself never throws for data-shape problems: it reports
 * insufficient data with null values and empty tables. These classes cover the
 * layers around it.
 */

/**
 * Error codes for categorization
 */
export const ErrorCode = {
  // Input errors
  VALIDATION_ERROR: "VALIDATION_ERROR",
  MISSING_REQUIRED_FIELD: "MISSING_REQUIRED_FIELD",

  // Upstream activity payloads
  PAYLOAD_ERROR: "PAYLOAD_ERROR",

  // Flat-file storage
  STORAGE_READ_ERROR: "STORAGE_READ_ERROR",
  STORAGE_WRITE_ERROR: "STORAGE_WRITE_ERROR",

  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class
 */
export class RangeInsightsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly context: Record<string, unknown> = {},
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "RangeInsightsError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Validation error - bad config or input values
 */
export class ValidationError extends RangeInsightsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context);
    this.name = "ValidationError";
  }
}

/**
 * Missing required field or column
 */
export class MissingFieldError extends RangeInsightsError {
  constructor(fieldName: string, context?: Record<string, unknown>) {
    super(`Missing required field: ${fieldName}`, ErrorCode.MISSING_REQUIRED_FIELD, { fieldName, ...context });
    this.name = "MissingFieldError";
  }
}

/**
 * Activity payload that does not match the expected scorecard shape
 */
export class PayloadError extends RangeInsightsError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(`Activity payload error: ${message}`, ErrorCode.PAYLOAD_ERROR, context, cause);
    this.name = "PayloadError";
  }
}

/**
 * Flat-file read/write error
 */
export class StorageError extends RangeInsightsError {
  constructor(
    operation: "read" | "write",
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    const code = operation === "read" ? ErrorCode.STORAGE_READ_ERROR : ErrorCode.STORAGE_WRITE_ERROR;
    super(`Storage ${operation} error: ${message}`, code, { operation, ...context }, cause);
    this.name = "StorageError";
  }
}

/**
 * Extract error info for logging
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  code: ErrorCodeType;
  context?: Record<string, unknown>;
  cause?: string;
} {
  if (error instanceof RangeInsightsError) {
    return {
      message: error.message,
      code: error.code,
      context: error.context,
      cause: error.cause?.message,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      code: ErrorCode.UNKNOWN_ERROR,
    };
  }

  return {
    message: String(error),
    code: ErrorCode.UNKNOWN_ERROR,
  };
}
