import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { loadConfig, loadConfigFile, USER_CONFIG_PATH, SYSTEM_CONFIG_PATH } from "../lib/config.js";
import { JAR_FOLDER_ENV } from "../lib/drivers/catalog.js";
import { formatError } from "../lib/errors/renderer.js";
import { isJdbcDriverError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# jdbc-drivers configuration
# Place at ~/.config/jdbc-drivers/config.yaml (user) or /etc/jdbc-drivers/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. ${JAR_FOLDER_ENV} environment variable (jarFolder only)
# 3. User config (~/.config/jdbc-drivers/config.yaml)
# 4. System config (/etc/jdbc-drivers/config.yaml)
# 5. Built-in defaults

# Folder the driver jars are installed into and looked up in
# jarFolder: ~/jdbc

download:
  # Transport: auto, fetch or node-fetch
  method: auto

  # Where the driver archives are hosted
  baseUrl: https://ohdsi.github.io/DatabaseConnectorJars/

redshift:
  # Jars from an earlier Redshift driver clash with the current one.
  # ask: prompt before deleting them, delete: always delete, keep: never delete
  staleJars: ask

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs
  json: false
`;

function describeError(error: unknown): string {
  if (isJdbcDriverError(error)) {
    return formatError(error).join("\n");
  }
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage jdbc-drivers configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", `Create system-wide config at ${SYSTEM_CONFIG_PATH}`)
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${error instanceof Error ? error.message : String(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green("  ✓ Valid"));
        } catch (error) {
          console.error(describeError(error));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'jdbc-drivers config init' to create one."));
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));
        console.log(chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`));
        if (process.env[JAR_FOLDER_ENV]) {
          console.log(chalk.gray(`${JAR_FOLDER_ENV}: ${process.env[JAR_FOLDER_ENV]}`));
        }

        console.log();
        console.log(`  jarFolder:      ${resolved.jarFolder ?? chalk.gray("(not set)")}`);
        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  method:         ${resolved.downloadMethod}`);
        console.log(`  baseUrl:        ${resolved.baseUrl}`);
        console.log();
        console.log(chalk.bold("Redshift:"));
        console.log(`  staleJars:      ${resolved.staleJars}`);
        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(describeError(error));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      for (const [label, path] of [
        ["User config", USER_CONFIG_PATH],
        ["System config", SYSTEM_CONFIG_PATH],
      ]) {
        console.log();
        console.log(chalk.bold(`${label}:`));
        console.log(`  ${path}`);
        console.log(`  ${existsSync(path) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      }
    });
}
