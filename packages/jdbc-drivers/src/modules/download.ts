import { Command } from "commander";
import chalk from "chalk";
import { effectiveStaleJarPolicy, isJsonMode } from "../lib/cli-context.js";
import { STALE_JAR_POLICIES } from "../lib/drivers/artifacts.js";
import { JAR_FOLDER_ENV, expandSelector, supportedSelectors } from "../lib/drivers/catalog.js";
import { missingPath } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { outputSuccess, type DownloadResultJson } from "../lib/json-output.js";
import { parseChoice } from "../lib/options.js";
import { DOWNLOAD_METHODS } from "../lib/ports/download.js";
import type { Services } from "../lib/services.js";
import { createSpinner, pausingPrompts } from "../lib/spinner.js";

export interface DownloadCommandOptions {
  path?: string;
  method?: string;
  staleJars?: string;
  config?: string;
}

export function registerDownloadCommand(program: Command, services: Services): void {
  program
    .command("download")
    .description("Download and unpack the JDBC drivers for a database engine")
    .argument("<dbms>", `Database engine: ${supportedSelectors().join(", ")}`)
    .option("-p, --path <dir>", `Folder to install the drivers into (default: $${JAR_FOLDER_ENV})`)
    .option("-m, --method <method>", `Download method: ${DOWNLOAD_METHODS.join(", ")}`)
    .option("--stale-jars <policy>", `Prior Redshift jars: ${STALE_JAR_POLICIES.join(", ")}`)
    .option("-c, --config <file>", "Config file to use")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  jdbc-drivers download postgresql --path ~/jdbc   ${chalk.gray("Install the PostgreSQL driver")}
  jdbc-drivers download all                        ${chalk.gray(`Install every driver into $${JAR_FOLDER_ENV}`)}
  jdbc-drivers download synapse --yes              ${chalk.gray("SQL Server driver, replacing prior jars without asking")}
`
    )
    .action(async (dbms: string, options: DownloadCommandOptions) => {
      await downloadDrivers(services, dbms, options);
    });
}

/**
 * Run a download and report it. Resolves with the installation folder, or
 * undefined after rendering the error and setting the exit code.
 */
export async function downloadDrivers(
  services: Services,
  dbms: string,
  options: DownloadCommandOptions
): Promise<string | undefined> {
  const spinner = createSpinner();

  try {
    const downloadMethod = parseChoice("method", options.method, DOWNLOAD_METHODS);
    const staleJars = parseChoice("stale-jars", options.staleJars, STALE_JAR_POLICIES);
    const { config } = services.loadConfig(options.config, {
      jarFolder: options.path,
      downloadMethod,
      staleJars,
    });

    if (!config.jarFolder) {
      throw missingPath();
    }

    const logger = services.createLogger(config);
    if (options.path && process.env[JAR_FOLDER_ENV] !== options.path) {
      logger.info(`Consider adding \`export ${JAR_FOLDER_ENV}='${options.path}'\` to your shell profile`);
    }

    const descriptors = expandSelector(dbms);
    const artifacts = services.createArtifacts(config, logger, pausingPrompts(spinner, services.prompts));

    spinner.start(`Downloading ${dbms} JDBC drivers...`);
    const path = await artifacts.fetchDrivers(dbms, config.jarFolder, {
      method: config.downloadMethod,
      staleJars: effectiveStaleJarPolicy(config.staleJars),
    });
    spinner.succeed(`JDBC drivers downloaded to ${path}`);

    if (isJsonMode()) {
      const result: DownloadResultJson = {
        path,
        engines: descriptors.map((d) => ({ dbms: d.dbms, version: d.version, archive: d.archiveFileName })),
      };
      outputSuccess(result);
    } else {
      console.log(path);
    }

    return path;
  } catch (error) {
    spinner.fail("Download failed");
    renderUnknownError(error);
    process.exitCode = 1;
    return undefined;
  }
}
