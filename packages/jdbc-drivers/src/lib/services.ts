import { createArtifactManager, type ArtifactManager } from "./drivers/artifacts.js";
import { createDownloadService } from "./adapters/fetch-download.js";
import { interactivePrompts } from "./adapters/interactive-prompts.js";
import { createJarClassPathRuntime, type JarDriverHandle } from "./adapters/jar-runtime.js";
import { zipExtractor } from "./adapters/zip-extractor.js";
import { isJsonMode } from "./cli-context.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import type { DriverRuntime } from "./ports/driver-runtime.js";
import type { PromptService } from "./ports/prompt.js";

/**
 * Everything the commands reach outside the process through.
 * Tests replace single members.
 */
export interface Services {
  loadConfig(explicitPath: string | undefined, cliOptions: Partial<ResolvedConfig>): {
    config: ResolvedConfig;
    sources: string[];
  };
  createLogger(config: ResolvedConfig): Logger;
  createArtifacts(config: ResolvedConfig, logger: Logger, prompts: PromptService): ArtifactManager;
  createRuntime(logger: Logger): DriverRuntime<JarDriverHandle>;
  prompts: PromptService;
}

export function createServices(overrides: Partial<Services> = {}): Services {
  return {
    loadConfig,
    createLogger(config) {
      // Info lines on stdout would break JSON output
      const level = isJsonMode() && (config.logLevel === "debug" || config.logLevel === "info") ? "warn" : config.logLevel;
      return createLogger({ level, json: config.logJson });
    },
    createArtifacts(config, logger, prompts) {
      return createArtifactManager({
        downloaderFor: createDownloadService,
        extractor: zipExtractor,
        prompts,
        staleJars: config.staleJars,
        baseUrl: config.baseUrl,
        logger: logger.child("artifacts"),
      });
    },
    createRuntime(logger) {
      return createJarClassPathRuntime(logger.child("runtime"));
    },
    prompts: interactivePrompts,
    ...overrides,
  };
}
