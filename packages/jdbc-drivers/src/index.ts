export {
  ALL_ENGINES,
  DRIVERS_BASE_URL,
  EMBEDDED_ENGINES,
  JAR_FOLDER_ENV,
  expandSelector,
  isEmbeddedEngine,
  knownEngines,
  listDescriptors,
  normalizeEngine,
  resolveEngine,
  supportedSelectors,
  type DbmsKey,
  type DriverDescriptor,
} from "./lib/drivers/catalog.js";
export {
  createDriverRegistry,
  joinClassPath,
  registryKey,
  splitClassPath,
  type ClassPath,
  type DriverRegistry,
  type DriverRegistryOptions,
} from "./lib/drivers/registry.js";
export {
  STALE_JAR_POLICIES,
  archiveUrl,
  createArtifactManager,
  createNameMatcher,
  expandHome,
  type ArtifactManager,
  type ArtifactManagerOptions,
  type DownloadOptions,
  type StaleJarPolicy,
} from "./lib/drivers/artifacts.js";
export { loadEngineDriver, type LoadEngineDriverOptions } from "./lib/drivers/loader.js";
export { JdbcDriverError, isJdbcDriverError, type ErrorCode, type JdbcDriverErrorOptions } from "./lib/errors/types.js";
export * as errors from "./lib/errors/catalog.js";
export * from "./lib/ports/index.js";
export * from "./lib/adapters/index.js";
export { createLogger, createNoopLogger, type Logger, type LoggerOptions, type LogLevel } from "./lib/logger.js";
export { loadConfig, loadConfigFile, resolveConfig, type ResolvedConfig, type ConfigFile } from "./lib/config.js";
