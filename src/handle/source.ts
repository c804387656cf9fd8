/**
 * @file Data-source resolution shared by exists and copy
 *
 * Priority is path > bytes > stream. Lower sources are never inspected once a
 * higher one is selected, so a stream is not touched while bytes exist.
 */
import type { ByteStream, FileHandle } from "./types";

export type PathSource = { kind: "path"; path: string };
export type BytesSource = { kind: "bytes"; bytes: Uint8Array };
export type StreamSource = { kind: "stream"; stream: ByteStream };
export type NoSource = { kind: "none" };

export type DataSource = BytesSource | StreamSource | NoSource;
export type PrimarySource = PathSource | DataSource;

/** In-memory and streamed sources only (the path is not considered). */
export function resolveDataSource(handle: FileHandle): DataSource {
  if (handle.bytes !== undefined) {
    return { kind: "bytes", bytes: handle.bytes };
  }
  if (handle.byteStream !== undefined) {
    return { kind: "stream", stream: handle.byteStream };
  }
  return { kind: "none" };
}

/** Pick the authoritative source. A stored path counts only on non-web handles. */
export function resolvePrimarySource(handle: FileHandle): PrimarySource {
  const access = handle.path;
  if (!handle.isWeb && access.kind === "available" && access.value !== undefined) {
    return { kind: "path", path: access.value };
  }
  return resolveDataSource(handle);
}
