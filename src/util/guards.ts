/**
 * @file Small type guards for unknown values
 */

/** Narrow unknown to a generic object record (non-null). */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Narrow to objects that carry a string `code` (Node errno errors: ENOENT, EACCES, ...). */
export function hasErrorCode(e: unknown): e is { code: string } {
  return isObject(e) && typeof e.code === "string";
}
