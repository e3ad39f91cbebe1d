import chalk from "chalk";
import { JdbcDriverError, isJdbcDriverError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";
import { outputError } from "../json-output.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Lines shown for an error in text mode, without trailing blank lines.
 */
export function formatError(error: JdbcDriverError): string[] {
  const lines: string[] = [`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`];

  if (error.details) {
    lines.push("");
    for (const line of error.details.split("\n")) {
      lines.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    lines.push("");
    lines.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    lines.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  if (error.docs) {
    lines.push(`  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  return lines;
}

/**
 * Render an error based on the current output mode.
 */
export function renderError(error: JdbcDriverError, mode?: OutputMode): void {
  if ((mode ?? getOutputMode()) === "json") {
    outputError(error);
    return;
  }

  console.error("");
  for (const line of formatError(error)) {
    console.error(line);
  }
  console.error("");
}

/**
 * Convert an unknown error to a JdbcDriverError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isJdbcDriverError(error) ? error : unknownError(error), mode);
}
