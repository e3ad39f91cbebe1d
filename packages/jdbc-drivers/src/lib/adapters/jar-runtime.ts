import AdmZip from "adm-zip";
import { existsSync, statSync } from "fs";
import { join, resolve } from "path";
import type { DriverRuntime } from "../ports/driver-runtime.js";
import { createNoopLogger, type Logger } from "../logger.js";

export interface JarDriverHandle {
  className: string;
  /** Class path at the time the driver was created */
  classPath: string[];
  /** Jar or directory the class was found in; absent for class-less embedded drivers */
  source?: string;
}

export interface JarClassPathRuntime extends DriverRuntime<JarDriverHandle> {
  readonly classPath: readonly string[];
}

function classFileEntry(className: string): string {
  return `${className.replace(/\./g, "/")}.class`;
}

/**
 * Driver runtime that resolves classes by looking inside the jars on its class path.
 *
 * It never starts a JVM: a handle records where the driver class lives so a
 * JVM launcher or bridge can be pointed at it. Swap in another
 * {@link DriverRuntime} to load drivers for real.
 */
export function createJarClassPathRuntime(logger: Logger = createNoopLogger()): JarClassPathRuntime {
  const classPath: string[] = [];

  function findSource(className: string): string | undefined {
    const entry = classFileEntry(className);

    for (const location of classPath) {
      if (!existsSync(location)) continue;

      if (statSync(location).isDirectory()) {
        if (existsSync(join(location, entry))) return location;
        continue;
      }

      try {
        if (new AdmZip(location).getEntry(entry)) return location;
      } catch (error) {
        logger.warn("Skipping unreadable class path entry", {
          location,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return undefined;
  }

  return {
    get classPath(): readonly string[] {
      return classPath;
    },

    addToClassPath(paths: readonly string[]): void {
      for (const path of paths) {
        if (!path) continue;
        const absolute = resolve(path);
        if (!classPath.includes(absolute)) {
          classPath.push(absolute);
          logger.debug("Added to class path", { path: absolute });
        }
      }
    },

    async resolveClass(className: string): Promise<boolean> {
      return findSource(className) !== undefined;
    },

    async instantiate(className: string): Promise<JarDriverHandle> {
      if (!className) {
        return { className, classPath: [...classPath] };
      }

      const source = findSource(className);
      if (!source) {
        throw new Error(`Class ${className} is not on the class path`);
      }
      return { className, classPath: [...classPath], source };
    },
  };
}
