/**
 * @file FileHandle public surface
 */
export type { ByteStream, FileHandle, FileHandleInit, FileHandleMap, PathAccess } from "./types";
export type { PrimarySource, DataSource, PathSource, BytesSource, StreamSource, NoSource } from "./source";
export { createFileHandle, fileHandleFromMap, fileHandleToMap } from "./create";
export { fileHandleFromPath } from "./from_path";
export { getPath, tryGetPath, WEB_PATH_REASON } from "./path";
export { resolvePrimarySource, resolveDataSource } from "./source";
export { fileHandleExists } from "./exists";
export { copyFileHandle, NO_SOURCE_MESSAGE } from "./copy";
export { fileHandleEquals, fileHandleHash } from "./equality";
export { getExtension, formatFileHandle } from "./format";
export { InvalidOperationError, InvalidStateError } from "./errors";
