import { Command } from "commander";
import { resolve } from "path";
import { isJsonMode } from "../lib/cli-context.js";
import { expandHome } from "../lib/drivers/artifacts.js";
import { JAR_FOLDER_ENV } from "../lib/drivers/catalog.js";
import { missingPath } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { outputSuccess, type LocateResultJson } from "../lib/json-output.js";
import type { Services } from "../lib/services.js";

export interface LocateCommandOptions {
  path?: string;
  config?: string;
}

export function registerLocateCommand(program: Command, services: Services): void {
  program
    .command("locate")
    .description("Print the installed jar files whose names match a pattern")
    .argument("<pattern>", "Regular expression matched against file names")
    .option("-p, --path <dir>", `Folder holding the drivers (default: $${JAR_FOLDER_ENV})`)
    .option("-c, --config <file>", "Config file to use")
    .action(async (pattern: string, options: LocateCommandOptions) => {
      await locateDrivers(services, pattern, options);
    });
}

export async function locateDrivers(
  services: Services,
  pattern: string,
  options: LocateCommandOptions
): Promise<string[]> {
  try {
    const { config } = services.loadConfig(options.config, { jarFolder: options.path });
    if (!config.jarFolder) {
      throw missingPath();
    }

    const logger = services.createLogger(config);
    const artifacts = services.createArtifacts(config, logger, services.prompts);
    const files = await artifacts.locateJar(pattern, config.jarFolder);

    if (isJsonMode()) {
      const result: LocateResultJson = { pattern, path: resolve(expandHome(config.jarFolder)), files };
      outputSuccess(result);
    } else {
      for (const file of files) {
        console.log(file);
      }
    }

    return files;
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
    return [];
  }
}
