/**
 * @file Existence check for a handle
 */
import type { FileHandle } from "./types";
import type { OperationOptions } from "../config/options";
import { normalizeOptions } from "../config/options";
import { resolvePrimarySource } from "./source";

/**
 * Whether the handle's authoritative source exists.
 * - path (non-web): asks the host, so this is the only branch that can report false while bytes/stream are present
 * - bytes: true, even when empty
 * - stream: true, without consuming it
 * - nothing: false
 * Host errors propagate.
 */
export async function fileHandleExists(handle: FileHandle, options?: OperationOptions): Promise<boolean> {
  const { host } = normalizeOptions(options);
  const source = resolvePrimarySource(handle);
  switch (source.kind) {
    case "path":
      return host.exists(source.path);
    case "bytes":
    case "stream":
      return true;
    case "none":
      return false;
  }
}
