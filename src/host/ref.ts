/**
 * @file File references bound to a host
 */
import type { FileRef, HostFS } from "./types";

/** Bind `path` to `host` so callers can chain further operations. */
export function createFileRef(host: HostFS, path: string): FileRef {
  return Object.freeze({
    path,
    exists: () => host.exists(path),
    read: () => host.readFile(path),
  });
}
