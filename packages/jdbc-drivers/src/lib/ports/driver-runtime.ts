/**
 * The runtime that actually loads driver classes.
 * The registry only ever talks to it through these three calls.
 */
export interface DriverRuntime<THandle> {
  /** Append locations to the class search path. Not reversible. */
  addToClassPath(paths: readonly string[]): void;
  /** Whether the named class can be found on the current class path */
  resolveClass(className: string): Promise<boolean>;
  /** Create the driver object for the named class */
  instantiate(className: string): Promise<THandle>;
}
