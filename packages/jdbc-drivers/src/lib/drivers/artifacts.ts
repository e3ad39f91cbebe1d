import { mkdir, readdir, rm, stat } from "fs/promises";
import { homedir } from "os";
import { basename, join, resolve } from "path";
import type { ArchiveExtractor } from "../ports/archive.js";
import type { DownloadMethod, DownloadService } from "../ports/download.js";
import type { PromptService } from "../ports/prompt.js";
import { createDownloadService } from "../adapters/fetch-download.js";
import { interactivePrompts } from "../adapters/interactive-prompts.js";
import { zipExtractor } from "../adapters/zip-extractor.js";
import { downloadFailed, invalidTarget, missingPath, noMatchingDriver, targetNotFound } from "../errors/catalog.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { DRIVERS_BASE_URL, expandSelector, isEmbeddedEngine, type DriverDescriptor } from "./catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What to do with Redshift jars left over from an earlier driver version */
export type StaleJarPolicy = "ask" | "delete" | "keep";

export const STALE_JAR_POLICIES = ["ask", "delete", "keep"] as const satisfies readonly StaleJarPolicy[];

export interface DownloadOptions {
  method?: DownloadMethod;
  staleJars?: StaleJarPolicy;
}

export interface ArtifactManagerOptions {
  /** Download service per transport; defaults to fetch / node-fetch */
  downloaderFor?: (method: DownloadMethod) => DownloadService;
  extractor?: ArchiveExtractor;
  /** Asked when the stale-jar policy is `ask` */
  prompts?: PromptService;
  /** Policy used when a call does not pass one */
  staleJars?: StaleJarPolicy;
  baseUrl?: string;
  logger?: Logger;
}

export interface ArtifactManager {
  /**
   * Download and unpack the drivers for an engine, an alias, or `all`.
   * Resolves with the installation folder.
   */
  fetchDrivers(dbmsSelector: string, targetDir: string, options?: DownloadOptions): Promise<string>;
  /** Absolute paths of the files in the folder whose names match the pattern */
  locateJar(namePattern: string, targetDir: string): Promise<string[]>;
  /** Throw unless the folder exists as a directory; embedded engines always pass */
  checkInstallationDirectory(targetDir: string, dbms?: string): Promise<void>;
}

type PathKind = "directory" | "file" | "missing";

/** Older Redshift driver jars that clash with the current one */
const STALE_REDSHIFT_PATTERN = "Redshift";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Expand a leading `~` to the home directory */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Build a file-name matcher. Patterns are regular expressions; one that does
 * not compile is matched as plain text.
 */
export function createNameMatcher(pattern: string): (name: string) => boolean {
  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch {
    return (name) => name.includes(pattern);
  }
  return (name) => regex.test(name);
}

export function archiveUrl(baseUrl: string, archiveFileName: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return new URL(archiveFileName, base).toString();
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function pathKind(path: string): Promise<PathKind> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? "directory" : "file";
  } catch (error) {
    if (isNotFound(error)) return "missing";
    throw error;
  }
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

async function listMatching(dir: string, pattern: string): Promise<string[]> {
  const matches = createNameMatcher(pattern);
  const entries = await readdir(dir, { withFileTypes: true });
  const candidates = entries.filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && matches(entry.name));
  // Links count only when they end at a regular file
  const keep = await Promise.all(
    candidates.map((entry) => entry.isFile() || isRegularFile(resolve(dir, entry.name)))
  );
  return candidates.filter((_, i) => keep[i]).map((entry) => resolve(dir, entry.name));
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createArtifactManager(options: ArtifactManagerOptions = {}): ArtifactManager {
  const downloaderFor = options.downloaderFor ?? createDownloadService;
  const extractor = options.extractor ?? zipExtractor;
  const prompts = options.prompts ?? interactivePrompts;
  const defaultPolicy = options.staleJars ?? "ask";
  const baseUrl = options.baseUrl ?? DRIVERS_BASE_URL;
  const logger = options.logger ?? createNoopLogger();

  async function clearStaleRedshiftJars(dir: string, policy: StaleJarPolicy): Promise<void> {
    const stale = await listMatching(dir, STALE_REDSHIFT_PATTERN);
    if (stale.length === 0) return;

    const names = stale.map((file) => basename(file));
    let remove = policy === "delete";
    if (policy === "ask") {
      remove = await prompts.confirm(
        `Prior JAR files have already been detected: '${names.join("', '")}'. Do you want to delete them?`
      );
    }

    if (!remove) {
      logger.info("Keeping prior Redshift JAR files", { files: names });
      return;
    }

    await Promise.all(stale.map((file) => rm(file, { force: true })));
    logger.info("Deleted prior Redshift JAR files", { files: names });
  }

  async function installDriver(descriptor: DriverDescriptor, dir: string, download: DownloadService): Promise<void> {
    const archivePath = join(dir, descriptor.archiveFileName);
    const url = archiveUrl(baseUrl, descriptor.archiveFileName);

    logger.debug("Downloading driver archive", { dbms: descriptor.dbms, url });

    let extracted: string[];
    try {
      await download.download(url, archivePath);
      extracted = await extractor.extract(archivePath, dir);
    } catch (error) {
      throw downloadFailed(descriptor.dbms, dir, error);
    }

    await rm(archivePath, { force: true });
    logger.info(`${descriptor.dbms} JDBC driver downloaded to '${dir}'`, {
      files: extracted.map((file) => basename(file)),
    });
  }

  async function checkInstallationDirectory(targetDir: string, dbms?: string): Promise<void> {
    if (isEmbeddedEngine(dbms)) return;
    if (!targetDir) throw missingPath();

    const dir = resolve(expandHome(targetDir));
    switch (await pathKind(dir)) {
      case "missing":
        throw targetNotFound(dir);
      case "file":
        throw invalidTarget(dir);
      case "directory":
        return;
    }
  }

  return {
    async fetchDrivers(dbmsSelector: string, targetDir: string, downloadOptions: DownloadOptions = {}): Promise<string> {
      if (!targetDir) throw missingPath();

      const dir = resolve(expandHome(targetDir));
      const kind = await pathKind(dir);
      if (kind === "file") throw invalidTarget(dir);

      const descriptors = expandSelector(dbmsSelector);
      const download = downloaderFor(downloadOptions.method ?? "auto");
      const policy = downloadOptions.staleJars ?? defaultPolicy;

      if (kind === "missing") {
        logger.warn(`The folder location '${dir}' does not exist. Attempting to create.`);
        await mkdir(dir, { recursive: true });
      }

      for (const descriptor of descriptors) {
        if (descriptor.dbms === "redshift") {
          await clearStaleRedshiftJars(dir, policy);
        }
        await installDriver(descriptor, dir, download);
      }

      return dir;
    },

    async locateJar(namePattern: string, targetDir: string): Promise<string[]> {
      await checkInstallationDirectory(targetDir);

      const dir = resolve(expandHome(targetDir));
      const files = await listMatching(dir, namePattern);
      if (files.length === 0) {
        throw noMatchingDriver(namePattern, dir);
      }
      return files;
    },

    checkInstallationDirectory,
  };
}
