/**
 * @file Operation options for handle I/O (raw -> resolved)
 */
import type { HostFS } from "../host/types";
import type { Logger, LogLevel } from "../logging/logger";
import { createConsoleLogger, isLogLevel } from "../logging/logger";
import { createNodeHostFS } from "../host/node";
import { isHostFS } from "../host/guards";

/** Emitted when `copy` skips a stored path whose file is missing and falls back to another source. */
export type FallbackEvent = {
  kind: "missing-path";
  name: string;
  path: string;
  fallback: "bytes" | "stream" | "none";
};

export type OperationOptions = {
  /** Filesystem the operation runs against. Defaults to the Node host. */
  host?: HostFS;
  /** Destination for diagnostics. Defaults to a console logger tagged `FileHandle`. */
  logger?: Logger;
  /** Observer for silent source degradation during `copy`. */
  onFallback?: (event: FallbackEvent) => void;
};

export type ResolvedOptions = {
  host: HostFS;
  logger: Logger;
  onFallback: (event: FallbackEvent) => void;
};

export const LOG_LEVEL_ENV = "ANYFILE_LOG_LEVEL";
export const DEFAULT_LOG_TAG = "FileHandle";

/** Default level, overridable through ANYFILE_LOG_LEVEL. */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV];
  return isLogLevel(raw) ? raw : "warn";
}

const shared: { host?: HostFS; logger?: Logger } = {};

function defaultHost(): HostFS {
  shared.host ??= createNodeHostFS();
  return shared.host;
}

function defaultLogger(): Logger {
  shared.logger ??= createConsoleLogger(DEFAULT_LOG_TAG, resolveLogLevel());
  return shared.logger;
}

/** Fill defaults and validate the host. Throws on a host that lacks required methods. */
export function normalizeOptions(options?: OperationOptions): ResolvedOptions {
  const host = options?.host ?? defaultHost();
  if (!isHostFS(host)) {
    throw new Error("options.host must implement exists/mkdirp/copyFile/writeFile/openWrite/readFile");
  }
  return {
    host,
    logger: options?.logger ?? defaultLogger(),
    onFallback: options?.onFallback ?? (() => {}),
  };
}
