/**
 * @file FileHandle construction and record conversion
 */
import type { ByteStream, FileHandle, FileHandleInit, FileHandleMap } from "./types";
import { toPathAccess } from "./path";
import { toUint8 } from "../util/bytes";

/** Create a frozen handle from explicit fields. */
export function createFileHandle(init: FileHandleInit): FileHandle {
  const isWeb = init.isWeb ?? false;
  return Object.freeze({
    name: init.name,
    size: init.size,
    path: Object.freeze(toPathAccess(init.path, isWeb)),
    bytes: init.bytes,
    byteStream: init.byteStream,
    identifier: init.identifier,
    isWeb,
  });
}

function optString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function optBytes(v: unknown): Uint8Array | undefined {
  if (v instanceof Uint8Array || v instanceof ArrayBuffer) {
    return toUint8(v);
  }
  return undefined;
}

/**
 * Build a handle from a loosely-typed record (`name`, `path`, `bytes`, `size`,
 * `identifier`, `isWeb`) plus an out-of-band stream.
 * Not a validating parser: null and wrongly-shaped fields are treated as absent.
 * A missing `name` becomes "" and a missing `size` becomes 0; check them
 * before use if the record comes from an untrusted bridge.
 */
export function fileHandleFromMap(data: Readonly<Record<string, unknown>>, readStream?: ByteStream): FileHandle {
  return createFileHandle({
    name: optString(data.name) ?? "",
    path: optString(data.path),
    bytes: optBytes(data.bytes),
    size: typeof data.size === "number" ? data.size : 0,
    identifier: optString(data.identifier),
    byteStream: readStream,
    isWeb: typeof data.isWeb === "boolean" ? data.isWeb : false,
  });
}

/** Record form of a handle. The stream is not carried; web handles report a null path. */
export function fileHandleToMap(handle: FileHandle): FileHandleMap {
  return {
    name: handle.name,
    path: handle.path.kind === "available" ? (handle.path.value ?? null) : null,
    bytes: handle.bytes ?? null,
    size: handle.size,
    identifier: handle.identifier ?? null,
    isWeb: handle.isWeb,
  };
}
