/**
 * @file Path capability of a handle
 */
import type { FileHandle, PathAccess } from "./types";
import { InvalidOperationError } from "./errors";

export const WEB_PATH_REASON =
  "On web `path` is unavailable: web platforms have no filesystem path. " +
  "Access `bytes` (or `byteStream`) instead.";

/** Build the path capability for a handle. */
export function toPathAccess(path: string | undefined, isWeb: boolean): PathAccess {
  if (isWeb) {
    return { kind: "unavailable", reason: WEB_PATH_REASON };
  }
  return { kind: "available", value: path };
}

/** Non-throwing view of the path capability. */
export function tryGetPath(handle: FileHandle): PathAccess {
  return handle.path;
}

/**
 * Filesystem path of the handle, possibly undefined.
 * Throws InvalidOperationError on web handles rather than returning a path nobody can open.
 */
export function getPath(handle: FileHandle): string | undefined {
  const access = handle.path;
  if (access.kind === "unavailable") {
    throw new InvalidOperationError(access.reason);
  }
  return access.value;
}
