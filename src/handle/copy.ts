/**
 * @file Copy a handle's content to a target path
 */
import type { ByteStream, FileHandle } from "./types";
import type { FileRef, HostFS } from "../host/types";
import type { Logger } from "../logging/logger";
import type { OperationOptions, ResolvedOptions } from "../config/options";
import type { DataSource, PrimarySource } from "./source";
import { normalizeOptions } from "../config/options";
import { createFileRef } from "../host/ref";
import { parentDirectory } from "../util/paths";
import { resolveDataSource, resolvePrimarySource } from "./source";
import { InvalidStateError } from "./errors";

export const NO_SOURCE_MESSAGE =
  "Cannot copy file: no valid data source available. " +
  "File must have either a valid path (non-web), bytes, or byteStream.";

/** The sink is closed on every exit; a close failure after a failed write never replaces the write error. */
async function writeStream(host: HostFS, targetPath: string, stream: ByteStream, logger: Logger): Promise<void> {
  const sink = await host.openWrite(targetPath);
  try {
    for await (const chunk of stream) {
      await sink.write(chunk);
    }
    await sink.flush();
  } catch (error) {
    await sink.close().catch((closeError: unknown) => {
      logger.debug(`closing ${targetPath} after a failed write also failed: ${String(closeError)}`);
    });
    throw error;
  }
  await sink.close();
}

/** A stored path only wins when its file exists; otherwise degrade to bytes/stream and report it. */
async function confirmSource(handle: FileHandle, primary: PrimarySource, opts: ResolvedOptions): Promise<PrimarySource> {
  if (primary.kind !== "path") {
    return primary;
  }
  if (await opts.host.exists(primary.path)) {
    return primary;
  }
  const next: DataSource = resolveDataSource(handle);
  opts.logger.warn(`source path for "${handle.name}" does not exist (${primary.path}); falling back to ${next.kind}`);
  opts.onFallback({ kind: "missing-path", name: handle.name, path: primary.path, fallback: next.kind });
  return next;
}

/**
 * Copy the handle to `targetPath`, creating missing parent directories first.
 *
 * Strategy follows the source priority: native file copy for an existing
 * non-web path, one write for bytes, chunked write for the stream. The stream
 * is single-pass; copying the same stream handle twice writes an empty file
 * the second time.
 *
 * Throws InvalidStateError when no source is available. Host I/O errors
 * propagate unmodified and nothing is rolled back.
 */
export async function copyFileHandle(
  handle: FileHandle,
  targetPath: string,
  options?: OperationOptions,
): Promise<FileRef> {
  const opts = normalizeOptions(options);
  const { host, logger } = opts;
  await host.mkdirp(parentDirectory(targetPath));

  const source = await confirmSource(handle, resolvePrimarySource(handle), opts);
  logger.debug(`copy "${handle.name}" -> ${targetPath} via ${source.kind}`);
  switch (source.kind) {
    case "path":
      await host.copyFile(source.path, targetPath);
      return createFileRef(host, targetPath);
    case "bytes":
      await host.writeFile(targetPath, source.bytes);
      return createFileRef(host, targetPath);
    case "stream":
      await writeStream(host, targetPath, source.stream, logger);
      return createFileRef(host, targetPath);
    case "none":
      throw new InvalidStateError(NO_SOURCE_MESSAGE);
  }
}
