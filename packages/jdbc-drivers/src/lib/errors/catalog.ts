import { JdbcDriverError } from "./types.js";

/**
 * Error catalog - factory functions for every JdbcDriverError the package raises.
 */

export const DRIVERS_DOCS_URL = "https://ohdsi.github.io/DatabaseConnector/reference/jdbcDrivers.html";

const DOWNLOAD_HINT = "Download the JDBC drivers for your database to the folder first";

// ============================================================================
// Installation Directory Errors
// ============================================================================

export function missingPath(): JdbcDriverError {
  return new JdbcDriverError("MISSING_PATH", "The path to the JDBC driver folder must be specified", {
    suggestion:
      "Pass --path, or set the DATABASECONNECTOR_JAR_FOLDER environment variable",
    example: "export DATABASECONNECTOR_JAR_FOLDER=~/jdbc",
    docs: DRIVERS_DOCS_URL,
  });
}

export function targetNotFound(path: string): JdbcDriverError {
  return new JdbcDriverError("TARGET_NOT_FOUND", `The folder '${path}' does not exist`, {
    suggestion: DOWNLOAD_HINT,
    example: `jdbc-drivers download all --path ${path}`,
    docs: DRIVERS_DOCS_URL,
  });
}

export function invalidTarget(path: string): JdbcDriverError {
  return new JdbcDriverError(
    "INVALID_TARGET",
    `The folder location '${path}' points to a file, but should point to a folder`,
    { suggestion: "Choose a folder path, or move the file out of the way" }
  );
}

// ============================================================================
// Engine and Artifact Errors
// ============================================================================

export function unsupportedEngine(dbms: string, supported: string[]): JdbcDriverError {
  return new JdbcDriverError("UNSUPPORTED_ENGINE", `No JDBC drivers are available for '${dbms}'`, {
    suggestion: `Choose from: ${supported.join(", ")}`,
  });
}

export function downloadFailed(dbms: string, path: string, cause?: unknown): JdbcDriverError {
  return new JdbcDriverError(
    "DOWNLOAD_FAILED",
    `Downloading and unzipping of ${dbms} JDBC driver to '${path}' has failed`,
    {
      suggestion: "Check your network connection and that the folder is writable",
      details: cause instanceof Error ? cause.message : undefined,
      cause,
    }
  );
}

export function noMatchingDriver(pattern: string, path: string): JdbcDriverError {
  return new JdbcDriverError(
    "NO_MATCHING_DRIVER",
    `No drivers matching pattern '${pattern}' found in folder '${path}'`,
    {
      suggestion: DOWNLOAD_HINT,
      example: `jdbc-drivers download all --path ${path}`,
      docs: DRIVERS_DOCS_URL,
    }
  );
}

// ============================================================================
// Driver Loading
// ============================================================================

export function driverClassNotFound(className: string, classPath: string): JdbcDriverError {
  return new JdbcDriverError("DRIVER_CLASS_NOT_FOUND", `Cannot find JDBC driver class ${className}`, {
    suggestion: "Check that the driver jar for this class is on the class path",
    details: classPath ? `Class path: ${classPath}` : "Class path is empty",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: readonly string[]): JdbcDriverError {
  return new JdbcDriverError("INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length ? `Choose from: ${validValues.join(", ")}` : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): JdbcDriverError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new JdbcDriverError("CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues above and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): JdbcDriverError {
  const message = error instanceof Error ? error.message : String(error);
  return new JdbcDriverError("UNKNOWN_ERROR", message, { cause: error });
}
