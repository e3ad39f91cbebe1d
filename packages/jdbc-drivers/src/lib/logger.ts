// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Component name printed before each message */
  scope?: string;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Logger for a sub-component; scopes nest as `parent:child` */
  child(scope: string): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a leveled logger.
 * info/debug go to stdout, warn/error to stderr, either as
 * `[timestamp] LEVEL scope: message {meta}` or one JSON object per line.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];

  function format(level: LogLevel, scope: string | undefined, message: string, meta: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = { timestamp, level, ...(scope ? { scope } : {}), message, ...meta };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const scoped = scope ? `${scope}: ${message}` : message;
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${scoped}${metaStr}`;
  }

  function build(scope: string | undefined): Logger {
    const log = (level: LogLevel, message: string, meta: Record<string, unknown> = {}) => {
      if (LOG_LEVELS[level] < minLevel) return;
      const line = format(level, scope, message, meta);
      if (level === "warn" || level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    };

    return {
      debug: (msg, meta) => log("debug", msg, meta),
      info: (msg, meta) => log("info", msg, meta),
      warn: (msg, meta) => log("warn", msg, meta),
      error: (msg, meta) => log("error", msg, meta),
      child: (childScope) => build(scope ? `${scope}:${childScope}` : childScope),
    };
  }

  return build(options.scope);
}

/**
 * Create a logger that discards everything.
 * Library callers that pass no logger get this one.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
