/**
 * @file Separator-agnostic path helpers (no node:path, usable in browsers)
 */

/** Parent directory of `p`, accepting `/` and `\` separators. "." when there is none. */
export function parentDirectory(p: string): string {
  const trimmed = p.replace(/[/\\]+$/, "");
  const idx = Math.max(trimmed.lastIndexOf("/"), trimmed.lastIndexOf("\\"));
  if (idx < 0) {
    return ".";
  }
  if (idx === 0) {
    return trimmed.charAt(0);
  }
  return trimmed.slice(0, idx);
}

/** Last segment of `p`. */
export function baseName(p: string): string {
  const trimmed = p.replace(/[/\\]+$/, "");
  const idx = Math.max(trimmed.lastIndexOf("/"), trimmed.lastIndexOf("\\"));
  return trimmed.slice(idx + 1);
}
