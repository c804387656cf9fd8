/**
 * @file Tests for operation option normalisation
 */
import { normalizeOptions, resolveLogLevel } from "./options";
import { createMemoryHostFS } from "../host/memory";
import { silentLogger } from "../logging/logger";
import type { HostFS } from "../host/types";

describe("config/options", () => {
  it("keeps explicit values", () => {
    const host = createMemoryHostFS();
    const onFallback = vi.fn();
    const opts = normalizeOptions({ host, logger: silentLogger, onFallback });
    expect(opts.host).toBe(host);
    expect(opts.logger).toBe(silentLogger);
    expect(opts.onFallback).toBe(onFallback);
  });

  it("fills shared defaults", () => {
    const a = normalizeOptions();
    const b = normalizeOptions({});
    expect(a.host).toBe(b.host);
    expect(a.logger).toBe(b.logger);
    expect(() => a.onFallback({ kind: "missing-path", name: "n", path: "p", fallback: "none" })).not.toThrow();
  });

  it("rejects an incomplete host", () => {
    const broken: unknown = { exists: async () => true };
    const host = broken as HostFS;
    expect(() => normalizeOptions({ host })).toThrow(/options.host must implement/);
  });

  it("reads the log level from the environment", () => {
    expect(resolveLogLevel({ ANYFILE_LOG_LEVEL: "debug" })).toBe("debug");
    expect(resolveLogLevel({ ANYFILE_LOG_LEVEL: "loud" })).toBe("warn");
    expect(resolveLogLevel({})).toBe("warn");
  });
});
