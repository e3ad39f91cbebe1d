import { Command } from "commander";
import chalk from "chalk";
import { basename } from "path";
import { isJsonMode } from "../lib/cli-context.js";
import { expandSelector, JAR_FOLDER_ENV, listDescriptors, type DriverDescriptor } from "../lib/drivers/catalog.js";
import { loadEngineDriver } from "../lib/drivers/loader.js";
import { createDriverRegistry } from "../lib/drivers/registry.js";
import { missingPath, noMatchingDriver } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJdbcDriverError } from "../lib/errors/types.js";
import { outputSuccess, type VerifyResultJson } from "../lib/json-output.js";
import type { Services } from "../lib/services.js";
import { createSpinner } from "../lib/spinner.js";

export interface VerifyCommandOptions {
  path?: string;
  config?: string;
}

type Check = VerifyResultJson["checks"][number];

export function registerVerifyCommand(program: Command, services: Services): void {
  program
    .command("verify")
    .description("Check that installed drivers provide their JDBC driver class")
    .argument("[dbms]", "Engine to check (default: every installed engine)")
    .option("-p, --path <dir>", `Folder holding the drivers (default: $${JAR_FOLDER_ENV})`)
    .option("-c, --config <file>", "Config file to use")
    .action(async (dbms: string | undefined, options: VerifyCommandOptions) => {
      await verifyDrivers(services, dbms, options);
    });
}

export async function verifyDrivers(
  services: Services,
  dbms: string | undefined,
  options: VerifyCommandOptions
): Promise<VerifyResultJson | undefined> {
  const spinner = createSpinner();

  try {
    const { config } = services.loadConfig(options.config, { jarFolder: options.path });
    if (!config.jarFolder) {
      throw missingPath();
    }
    const folder = config.jarFolder;

    const logger = services.createLogger(config);
    const artifacts = services.createArtifacts(config, logger, services.prompts);
    const registry = createDriverRegistry(services.createRuntime(logger), { logger: logger.child("registry") });

    await artifacts.checkInstallationDirectory(folder);

    let engines: DriverDescriptor[];
    if (dbms) {
      engines = expandSelector(dbms);
    } else {
      engines = [];
      for (const descriptor of listDescriptors()) {
        try {
          await artifacts.locateJar(descriptor.jarPattern, folder);
          engines.push(descriptor);
        } catch (error) {
          if (!isJdbcDriverError(error, "NO_MATCHING_DRIVER")) throw error;
        }
      }
      if (engines.length === 0) {
        throw noMatchingDriver(".jar", folder);
      }
    }

    spinner.start("Verifying drivers...");
    const checks: Check[] = [];
    for (const descriptor of engines) {
      spinner.text = `Verifying ${descriptor.dbms}...`;
      try {
        const handle = await loadEngineDriver({ dbms: descriptor.dbms, pathToDriver: folder, artifacts, registry });
        checks.push({ dbms: descriptor.dbms, status: "pass", driverClass: descriptor.driverClass, source: handle.source });
      } catch (error) {
        if (!isJdbcDriverError(error)) throw error;
        checks.push({ dbms: descriptor.dbms, status: "fail", driverClass: descriptor.driverClass, error: error.message });
      }
    }
    spinner.stop();

    const result: VerifyResultJson = { path: folder, checks };
    if (checks.some((c) => c.status === "fail")) {
      process.exitCode = 1;
    }

    if (isJsonMode()) {
      outputSuccess(result);
      return result;
    }

    for (const check of checks) {
      if (check.status === "pass") {
        const from = check.source ? chalk.gray(` (${basename(check.source)})`) : "";
        console.log(`${chalk.green("✓")} ${check.dbms}: ${check.driverClass}${from}`);
      } else {
        console.log(`${chalk.red("✗")} ${check.dbms}: ${check.error}`);
      }
    }

    return result;
  } catch (error) {
    spinner.stop();
    renderUnknownError(error);
    process.exitCode = 1;
    return undefined;
  }
}
