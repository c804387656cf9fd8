/**
 * @file Display helpers
 */
import type { FileHandle } from "./types";

/** Text after the last ".". Names without a "." return the whole name. */
export function getExtension(handle: FileHandle): string {
  const idx = handle.name.lastIndexOf(".");
  return idx < 0 ? handle.name : handle.name.slice(idx + 1);
}

/** One-line description; the path part is left out for web handles. */
export function formatFileHandle(handle: FileHandle): string {
  const parts = [
    handle.path.kind === "available" ? `path ${handle.path.value ?? "none"}` : undefined,
    `name: ${handle.name}`,
    `bytes: ${handle.bytes === undefined ? "none" : `${handle.bytes.length} bytes`}`,
    `byteStream: ${handle.byteStream === undefined ? "none" : "present"}`,
    `size: ${handle.size}`,
  ];
  return `FileHandle(${parts.filter((p) => p !== undefined).join(", ")})`;
}
