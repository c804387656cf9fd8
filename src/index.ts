/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Aggregates the FileHandle API, the host filesystems it runs against, and
 * the option/logging types operations accept. Browser-only helpers live
 * under src/web and are exported here as well.
 */

/**
 * FileHandle value object and its operations
 * - createFileHandle / fileHandleFromMap: construction
 * - fileHandleExists / copyFileHandle: I/O following path > bytes > stream
 * @public
 */
export type { ByteStream, FileHandle, FileHandleInit, FileHandleMap, PathAccess } from "./handle/index";
export type { PrimarySource, DataSource, PathSource, BytesSource, StreamSource, NoSource } from "./handle/index";
export {
  createFileHandle,
  fileHandleFromMap,
  fileHandleToMap,
  fileHandleFromPath,
  getPath,
  tryGetPath,
  resolvePrimarySource,
  resolveDataSource,
  fileHandleExists,
  copyFileHandle,
  fileHandleEquals,
  fileHandleHash,
  getExtension,
  formatFileHandle,
  InvalidOperationError,
  InvalidStateError,
} from "./handle/index";

/**
 * Host filesystems
 * @public
 */
export type { HostFS, WriteSink, FileRef } from "./host/types";
export { createNodeHostFS } from "./host/node";
export { createMemoryHostFS } from "./host/memory";
export { isHostFS } from "./host/guards";

/**
 * Options and logging
 * @public
 */
export type { OperationOptions, FallbackEvent } from "./config/options";
export type { Logger, LogLevel } from "./logging/logger";
export { createConsoleLogger, silentLogger } from "./logging/logger";

/**
 * Web (Blob/ReadableStream) helpers
 * @public
 */
export { fileHandleFromBlob, fileHandleFromBlobBytes, readableToByteStream } from "./web/index";
export type { BlobLike, BlobHandleOptions, ReadableByteSource } from "./web/index";
