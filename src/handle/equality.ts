/**
 * @file Equality and hashing for handles
 *
 * `bytes` compare by content, `byteStream` by identity (a partially consumed
 * stream has no meaningful content to compare). Web handles ignore the path
 * and all hash to 0: every web handle lands in one bucket. That collision is
 * accepted; the path cannot be asked of them.
 */
import type { FileHandle } from "./types";
import { bytesEqual } from "../util/bytes";
import { combineHashes, hashBytes, hashString, identityHash } from "../util/hash";

function storedPath(handle: FileHandle): string | undefined {
  return handle.path.kind === "available" ? handle.path.value : undefined;
}

function optionalBytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return bytesEqual(a, b);
}

/** Structural equality. Handles on different platforms (`isWeb`) never compare equal. */
export function fileHandleEquals(a: FileHandle, b: FileHandle): boolean {
  if (a === b) {
    return true;
  }
  if (a.isWeb !== b.isWeb) {
    return false;
  }
  if (!a.isWeb && storedPath(a) !== storedPath(b)) {
    return false;
  }
  return (
    a.name === b.name &&
    optionalBytesEqual(a.bytes, b.bytes) &&
    a.byteStream === b.byteStream &&
    a.identifier === b.identifier &&
    a.size === b.size
  );
}

/** Hash consistent with fileHandleEquals. */
export function fileHandleHash(handle: FileHandle): number {
  if (handle.isWeb) {
    return 0;
  }
  const path = storedPath(handle);
  return combineHashes([
    path === undefined ? undefined : hashString(path),
    hashString(handle.name),
    handle.bytes === undefined ? undefined : hashBytes(handle.bytes),
    handle.byteStream === undefined ? undefined : identityHash(handle.byteStream),
    handle.identifier === undefined ? undefined : hashString(handle.identifier),
    handle.size >>> 0,
  ]);
}
