/**
 * Error codes for every failure the driver manager surfaces.
 * Each code maps to a specific scenario with predefined messaging.
 */
export type ErrorCode =
  // Installation directory errors
  | "MISSING_PATH"
  | "TARGET_NOT_FOUND"
  | "INVALID_TARGET"
  // Engine and artifact errors
  | "UNSUPPORTED_ENGINE"
  | "DOWNLOAD_FAILED"
  | "NO_MATCHING_DRIVER"
  // Driver loading
  | "DRIVER_CLASS_NOT_FOUND"
  // Validation errors
  | "INVALID_OPTION"
  | "CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

export interface JdbcDriverErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  docs?: string;
  cause?: unknown;
}

/**
 * Error raised by the driver manager, carrying a code and hints for the user.
 */
export class JdbcDriverError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;
  readonly docs?: string;

  constructor(code: ErrorCode, message: string, options?: JdbcDriverErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "JdbcDriverError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
    this.docs = options?.docs;
  }
}

/**
 * Type guard to check if an error is a JdbcDriverError, optionally of one code.
 */
export function isJdbcDriverError(error: unknown, code?: ErrorCode): error is JdbcDriverError {
  return error instanceof JdbcDriverError && (code === undefined || error.code === code);
}
