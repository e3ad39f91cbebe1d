import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { DRIVERS_BASE_URL, JAR_FOLDER_ENV } from "./drivers/catalog.js";
import { STALE_JAR_POLICIES, type StaleJarPolicy } from "./drivers/artifacts.js";
import { DOWNLOAD_METHODS, type DownloadMethod } from "./ports/download.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/jdbc-drivers/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "jdbc-drivers", "config.yaml");

export const CONFIG_DEFAULTS = {
  downloadMethod: "auto",
  baseUrl: DRIVERS_BASE_URL,
  staleJars: "ask",
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z
  .object({
    jarFolder: z.string().min(1).optional(),
    download: z
      .object({
        method: z.enum(DOWNLOAD_METHODS).optional(),
        baseUrl: z.string().url().optional(),
      })
      .strict()
      .optional(),
    redshift: z
      .object({
        staleJars: z.enum(STALE_JAR_POLICIES).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  /** Installation folder; undefined when no source names one */
  jarFolder?: string;
  downloadMethod: DownloadMethod;
  baseUrl: string;
  staleJars: StaleJarPolicy;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist, throws CONFIG_INVALID if it can't be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    );
  }

  return result.data;
}

function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.jarFolder !== undefined) {
    target.jarFolder = source.jarFolder;
  }
  if (source.download?.method !== undefined) {
    target.downloadMethod = source.download.method;
  }
  if (source.download?.baseUrl !== undefined) {
    target.baseUrl = source.download.baseUrl;
  }
  if (source.redshift?.staleJars !== undefined) {
    target.staleJars = source.redshift.staleJars;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined)) as Partial<T>;
}

/**
 * Merge configuration sources with precedence:
 * CLI options > DATABASECONNECTOR_JAR_FOLDER > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const config: ResolvedConfig = {
    downloadMethod: CONFIG_DEFAULTS.downloadMethod,
    baseUrl: CONFIG_DEFAULTS.baseUrl,
    staleJars: CONFIG_DEFAULTS.staleJars,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  const envFolder = env[JAR_FOLDER_ENV];
  if (envFolder) {
    config.jarFolder = envFolder;
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given on the command line; replaces the system and user files
 * @returns The resolved config and the files it was read from
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): { config: ResolvedConfig; sources: string[] } {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
