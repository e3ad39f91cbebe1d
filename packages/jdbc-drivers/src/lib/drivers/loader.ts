import { isJdbcDriverError } from "../errors/types.js";
import type { ArtifactManager, DownloadOptions } from "./artifacts.js";
import { isEmbeddedEngine, resolveEngine } from "./catalog.js";
import type { DriverRegistry } from "./registry.js";

export interface LoadEngineDriverOptions<THandle> {
  dbms: string;
  pathToDriver: string;
  artifacts: ArtifactManager;
  registry: DriverRegistry<THandle>;
  /** Download the engine's drivers when none are installed yet */
  download?: DownloadOptions | false;
}

/**
 * Get the driver for a database engine.
 *
 * Embedded engines get the class-less driver without touching the folder.
 * Others have their driver jar located in `pathToDriver` (downloaded first
 * when `download` is set and nothing is installed) and loaded through the
 * registry.
 */
export async function loadEngineDriver<THandle>(options: LoadEngineDriverOptions<THandle>): Promise<THandle> {
  const { dbms, pathToDriver, artifacts, registry } = options;

  if (isEmbeddedEngine(dbms)) {
    return registry.getOrLoadDriver("", "");
  }

  const descriptor = resolveEngine(dbms);

  let jars: string[];
  try {
    jars = await artifacts.locateJar(descriptor.jarPattern, pathToDriver);
  } catch (error) {
    const missing =
      isJdbcDriverError(error, "NO_MATCHING_DRIVER") || isJdbcDriverError(error, "TARGET_NOT_FOUND");
    if (!options.download || !missing) throw error;

    await artifacts.fetchDrivers(descriptor.dbms, pathToDriver, options.download);
    jars = await artifacts.locateJar(descriptor.jarPattern, pathToDriver);
  }

  return registry.getOrLoadDriver(descriptor.driverClass, jars);
}
