/**
 * Global CLI context for shared options and state.
 */

import type { StaleJarPolicy } from "./drivers/artifacts.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Answer yes to confirmation prompts */
  yes: boolean;
  /** Never prompt; questions get their safe default */
  noInput: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthyEnv(env.JDBC_DRIVERS_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthyEnv(env.JDBC_DRIVERS_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y") || isTruthyEnv(env.JDBC_DRIVERS_YES)) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input") || env.CI || isTruthyEnv(env.JDBC_DRIVERS_NO_INPUT)) {
    currentContext.noInput = true;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdout.isTTY;
}

/**
 * Stale-jar policy after applying --yes, --no-input and --json.
 * `--yes` deletes; a session that cannot prompt keeps the files.
 * JSON output owns stdout, so it never prompts either.
 */
export function effectiveStaleJarPolicy(configured: StaleJarPolicy): StaleJarPolicy {
  if (configured !== "ask") return configured;
  if (currentContext.yes) return "delete";
  if (currentContext.json || isNonInteractive()) return "keep";
  return "ask";
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
