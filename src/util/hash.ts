/**
 * @file Stable 32-bit hashing for value objects
 *
 * Mixing follows the integer finalizer used for placement hashing; strings and
 * bytes are folded through FNV-1a first. Results are unsigned 32-bit integers.
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** Avalanche a 32-bit integer. */
export function hash32(x: number): number {
  const a = (x ^ (x >>> 16)) >>> 0;
  const b = Math.imul(a, 0x7feb352d) >>> 0;
  const c = (b ^ (b >>> 15)) >>> 0;
  const d = Math.imul(c, 0x846ca68b) >>> 0;
  return (d ^ (d >>> 16)) >>> 0;
}

/** FNV-1a over a byte sequence. */
export function hashBytes(data: Uint8Array): number {
  return data.reduce((h, b) => Math.imul(h ^ b, FNV_PRIME) >>> 0, FNV_OFFSET);
}

/** FNV-1a over the code points of a string. */
export function hashString(s: string): number {
  return Array.from(s).reduce((h, ch) => {
    const code = ch.codePointAt(0) ?? 0;
    return Math.imul(h ^ code, FNV_PRIME) >>> 0;
  }, FNV_OFFSET);
}

/** Combine field hashes in order; absent fields contribute a fixed marker. */
export function combineHashes(parts: readonly (number | undefined)[]): number {
  return parts.reduce<number>((acc, p) => hash32((Math.imul(acc, 31) + (p ?? 0x9e3779b9)) >>> 0), 17);
}

const identityIds = new WeakMap<object, number>();
const identityCounter = { next: 1 };

/** Stable per-object id, used to hash values compared by identity. */
export function identityHash(obj: object): number {
  const known = identityIds.get(obj);
  if (known !== undefined) {
    return known;
  }
  const id = hash32(identityCounter.next++);
  identityIds.set(obj, id);
  return id;
}
