/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "interactive" | "plain" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `interactive`: colored output with spinners
 * - `plain`: text output for CI, pipes and dumb terminals
 * - `json`: structured JSON output for scripting
 */
export function getOutputMode(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): OutputMode {
  if (argv.includes("--json") || env.JDBC_DRIVERS_JSON === "1" || env.JDBC_DRIVERS_JSON === "true") {
    return "json";
  }

  if (env.CI || !process.stdout.isTTY || env.TERM === "dumb") {
    return "plain";
  }

  return "interactive";
}
