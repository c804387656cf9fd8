/**
 * @file Web handles built from Blob/File objects
 *
 * Produced handles are `isWeb: true`; the path is never available on them.
 */
import type { FileHandle } from "../handle/types";
import type { ReadableByteSource } from "./readable";
import { createFileHandle } from "../handle/create";
import { readableToByteStream } from "./readable";

/** Structural subset of Blob (and File, which adds `name`). */
export type BlobLike = {
  readonly size: number;
  readonly name?: string;
  stream(): ReadableByteSource;
  arrayBuffer(): Promise<ArrayBuffer>;
};

export type BlobHandleOptions = { name?: string; identifier?: string };

function resolveName(blob: BlobLike, options?: BlobHandleOptions): string {
  const name = options?.name ?? blob.name;
  if (name === undefined || name === "") {
    throw new Error("blob has no name; pass options.name");
  }
  return name;
}

/** Stream-backed web handle. Content is read lazily and only once. */
export function fileHandleFromBlob(blob: BlobLike, options?: BlobHandleOptions): FileHandle {
  return createFileHandle({
    name: resolveName(blob, options),
    size: blob.size,
    byteStream: readableToByteStream(blob.stream()),
    identifier: options?.identifier,
    isWeb: true,
  });
}

/** Bytes-backed web handle: the blob is read fully up front. */
export async function fileHandleFromBlobBytes(blob: BlobLike, options?: BlobHandleOptions): Promise<FileHandle> {
  const name = resolveName(blob, options);
  const bytes = new Uint8Array(await blob.arrayBuffer());
  return createFileHandle({
    name,
    size: blob.size,
    bytes,
    identifier: options?.identifier,
    isWeb: true,
  });
}
