import { delimiter } from "path";
import type { DriverRuntime } from "../ports/driver-runtime.js";
import { driverClassNotFound } from "../errors/catalog.js";
import { createNoopLogger, type Logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Jar locations, either joined with the platform delimiter or as a list */
export type ClassPath = string | readonly string[];

export interface DriverRegistry<THandle> {
  /**
   * Return the driver for this class and class path, loading it on first use.
   * Concurrent calls for the same pair share a single load.
   */
  getOrLoadDriver(driverClassName: string, classPath: ClassPath): Promise<THandle>;
  /** Whether a loaded driver is cached for this class and class path */
  has(driverClassName: string, classPath: ClassPath): boolean;
  /** Number of loaded drivers */
  readonly size: number;
}

export interface DriverRegistryOptions {
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function splitClassPath(classPath: ClassPath): string[] {
  const parts = typeof classPath === "string" ? classPath.split(delimiter) : [...classPath];
  return parts.filter((part) => part.length > 0);
}

export function joinClassPath(classPath: ClassPath): string {
  return splitClassPath(classPath).join(delimiter);
}

/** Cache key for a class and class path; JSON keeps distinct pairs distinct */
export function registryKey(driverClassName: string, classPath: ClassPath): string {
  return JSON.stringify([driverClassName, joinClassPath(classPath)]);
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a driver registry over a driver runtime.
 *
 * Each (class, class path) pair is loaded at most once. A failed load is not
 * cached, so the caller can fix the class path and try again.
 */
export function createDriverRegistry<THandle>(
  runtime: DriverRuntime<THandle>,
  options: DriverRegistryOptions = {}
): DriverRegistry<THandle> {
  const logger = options.logger ?? createNoopLogger();
  const loaded = new Map<string, THandle>();
  const inFlight = new Map<string, Promise<THandle>>();

  async function load(driverClassName: string, classPath: ClassPath): Promise<THandle> {
    const paths = splitClassPath(classPath);
    runtime.addToClassPath(paths);

    if (driverClassName && !(await runtime.resolveClass(driverClassName))) {
      throw driverClassNotFound(driverClassName, joinClassPath(paths));
    }

    const handle = await runtime.instantiate(driverClassName);
    logger.debug("Driver loaded", { driverClass: driverClassName, classPath: paths });
    return handle;
  }

  return {
    getOrLoadDriver(driverClassName: string, classPath: ClassPath): Promise<THandle> {
      const key = registryKey(driverClassName, classPath);

      const cached = loaded.get(key);
      if (cached != null) {
        return Promise.resolve(cached);
      }

      const pending = inFlight.get(key);
      if (pending) {
        return pending;
      }

      const loading = load(driverClassName, classPath)
        .then((handle) => {
          loaded.set(key, handle);
          return handle;
        })
        .finally(() => {
          inFlight.delete(key);
        });

      inFlight.set(key, loading);
      return loading;
    },

    has(driverClassName: string, classPath: ClassPath): boolean {
      return loaded.get(registryKey(driverClassName, classPath)) != null;
    },

    get size(): number {
      return loaded.size;
    },
  };
}
