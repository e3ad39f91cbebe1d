import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { basename } from "path";
import { isJsonMode } from "../lib/cli-context.js";
import type { ArtifactManager } from "../lib/drivers/artifacts.js";
import { JAR_FOLDER_ENV, listDescriptors, type DriverDescriptor } from "../lib/drivers/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isJdbcDriverError } from "../lib/errors/types.js";
import { outputSuccess, type ListResultJson } from "../lib/json-output.js";
import type { Services } from "../lib/services.js";

export interface ListCommandOptions {
  path?: string;
  config?: string;
}

export function registerListCommand(program: Command, services: Services): void {
  program
    .command("list")
    .description("Show the supported engines, their driver versions and what is installed")
    .option("-p, --path <dir>", `Folder holding the drivers (default: $${JAR_FOLDER_ENV})`)
    .option("-c, --config <file>", "Config file to use")
    .action(async (options: ListCommandOptions) => {
      await listDrivers(services, options);
    });
}

async function installedJars(artifacts: ArtifactManager, descriptor: DriverDescriptor, dir: string): Promise<string[]> {
  try {
    return await artifacts.locateJar(descriptor.jarPattern, dir);
  } catch (error) {
    if (isJdbcDriverError(error, "NO_MATCHING_DRIVER")) return [];
    throw error;
  }
}

export async function listDrivers(services: Services, options: ListCommandOptions): Promise<ListResultJson | undefined> {
  try {
    const { config } = services.loadConfig(options.config, { jarFolder: options.path });
    const logger = services.createLogger(config);
    const artifacts = services.createArtifacts(config, logger, services.prompts);

    let folder = config.jarFolder;
    if (folder) {
      try {
        await artifacts.checkInstallationDirectory(folder);
      } catch (error) {
        if (!isJdbcDriverError(error)) throw error;
        logger.warn(error.message);
        folder = undefined;
      }
    }

    const result: ListResultJson = { path: folder, engines: [] };
    for (const descriptor of listDescriptors()) {
      result.engines.push({
        dbms: descriptor.dbms,
        version: descriptor.version,
        archive: descriptor.archiveFileName,
        driverClass: descriptor.driverClass,
        installed: folder ? await installedJars(artifacts, descriptor, folder) : undefined,
      });
    }

    if (isJsonMode()) {
      outputSuccess(result);
      return result;
    }

    const head = ["DBMS", "Version", "Driver class"];
    if (folder) head.push("Installed");

    const table = new CliTable3({ head: head.map((h) => chalk.cyan(h)) });
    for (const engine of result.engines) {
      const row = [engine.dbms, engine.version, engine.driverClass];
      if (engine.installed) {
        row.push(engine.installed.length > 0 ? engine.installed.map((f) => basename(f)).join("\n") : chalk.gray("-"));
      }
      table.push(row);
    }

    console.log(table.toString());
    if (!folder) {
      console.log(chalk.gray(`\nPass --path or set ${JAR_FOLDER_ENV} to see installed drivers.`));
    }

    return result;
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
    return undefined;
  }
}
