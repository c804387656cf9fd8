/**
 * @file Build a handle for an existing file on the local filesystem (Node only)
 */
import { stat } from "node:fs/promises";
import type { FileHandle } from "./types";
import { createFileHandle } from "./create";
import { baseName } from "../util/paths";

/** Name from the last path segment, size from stat. Stat errors (ENOENT, ...) propagate. */
export async function fileHandleFromPath(path: string, options?: { name?: string; identifier?: string }): Promise<FileHandle> {
  const st = await stat(path);
  if (!st.isFile()) {
    throw new Error(`not a regular file: ${path}`);
  }
  return createFileHandle({
    name: options?.name ?? baseName(path),
    size: st.size,
    path,
    identifier: options?.identifier,
  });
}
