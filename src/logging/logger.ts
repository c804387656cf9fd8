/**
 * @file Tagged console logger
 *
 * Messages go through `console` with a `[Tag]` prefix. The level gate drops
 * anything below the configured threshold.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Narrow an arbitrary string to a known log level. */
export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, x);
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Create a console-backed logger that prefixes every line with `[tag]`. */
export function createConsoleLogger(tag: string, level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_RANK[level];
  const enabled = (l: Exclude<LogLevel, "silent">): boolean => LEVEL_RANK[l] >= threshold;
  const fmt = (message: string): string => `[${tag}] ${message}`;
  return {
    debug(message) {
      if (enabled("debug")) {
        console.debug(fmt(message));
      }
    },
    info(message) {
      if (enabled("info")) {
        console.info(fmt(message));
      }
    },
    warn(message) {
      if (enabled("warn")) {
        console.warn(fmt(message));
      }
    },
    error(message) {
      if (enabled("error")) {
        console.error(fmt(message));
      }
    },
  };
}
