/**
 * JSON output utilities for machine-readable CLI output.
 */

import { JdbcDriverError } from "./errors/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
    docs?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  path: string;
  engines: Array<{ dbms: string; version: string; archive: string }>;
}

export interface LocateResultJson {
  pattern: string;
  path: string;
  files: string[];
}

export interface ListResultJson {
  path?: string;
  engines: Array<{
    dbms: string;
    version: string;
    archive: string;
    driverClass: string;
    installed?: string[];
  }>;
}

export interface VerifyResultJson {
  path: string;
  checks: Array<{
    dbms: string;
    status: "pass" | "fail";
    driverClass: string;
    source?: string;
    error?: string;
  }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: Error): void {
  const result: JsonError = {
    success: false,
    error: {
      code: error instanceof JdbcDriverError ? error.code : "UNKNOWN_ERROR",
      message: error.message,
      ...(error instanceof JdbcDriverError && error.suggestion && { suggestion: error.suggestion }),
      ...(error instanceof JdbcDriverError && error.details && { details: error.details }),
      ...(error instanceof JdbcDriverError && error.docs && { docs: error.docs }),
    },
  };
  console.error(JSON.stringify(result, null, 2));
}
