/**
 * @file FileHandle data model
 */

/** Single-pass sequence of byte chunks. Not restartable. */
export type ByteStream = AsyncIterable<Uint8Array>;

/**
 * Whether a filesystem path can be asked for at all.
 * Web handles carry `unavailable`, whatever path string the producer supplied.
 */
export type PathAccess =
  | { kind: "available"; value: string | undefined }
  | { kind: "unavailable"; reason: string };

/**
 * One logical file. Frozen after construction.
 *
 * `size` is the declared size and is never checked against the source.
 * `identifier` is an opaque platform reference (content URI, bookmark), not a path.
 */
export type FileHandle = Readonly<{
  name: string;
  size: number;
  path: PathAccess;
  bytes?: Uint8Array;
  byteStream?: ByteStream;
  identifier?: string;
  isWeb: boolean;
}>;

export type FileHandleInit = {
  name: string;
  size: number;
  path?: string;
  bytes?: Uint8Array;
  byteStream?: ByteStream;
  identifier?: string;
  isWeb?: boolean;
};

/** Loosely-typed record form, as produced by pickers and platform bridges. */
export type FileHandleMap = {
  name: string;
  path: string | null;
  bytes: Uint8Array | null;
  size: number;
  identifier: string | null;
  isWeb: boolean;
};
