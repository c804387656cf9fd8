/**
 * @file Byte helpers shared by the handle and host layers
 */

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/** Compare two byte sequences by content. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) {
    return true;
  }
  if (a.length !== b.length) {
    return false;
  }
  for (const [i, v] of a.entries()) {
    if (b[i] !== v) {
      return false;
    }
  }
  return true;
}

/** Concatenate chunks into a single buffer. */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((acc, p) => acc + p.length, 0);
  const out = new Uint8Array(total);
  parts.reduce((off, p) => {
    out.set(p, off);
    return off + p.length;
  }, 0);
  return out;
}

/** Copy into a fresh, exactly-sized Uint8Array (detaches from Node's Buffer pool). */
export function cloneBytes(data: Uint8Array): Uint8Array {
  const out = new Uint8Array(data.byteLength);
  out.set(data);
  return out;
}
