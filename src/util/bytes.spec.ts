/**
 * @file Tests for byte helpers
 */
import { bytesEqual, cloneBytes, concatBytes, toUint8 } from "./bytes";

describe("util/bytes", () => {
  it("compares by content", () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
    expect(bytesEqual(new Uint8Array(), new Uint8Array())).toBe(true);
  });

  it("concatenates chunks in order", () => {
    const out = concatBytes([new Uint8Array([1]), new Uint8Array(), new Uint8Array([2, 3])]);
    expect(Array.from(out)).toEqual([1, 2, 3]);
  });

  it("wraps ArrayBuffer and clones", () => {
    const buf = new ArrayBuffer(2);
    new Uint8Array(buf).set([5, 6]);
    expect(Array.from(toUint8(buf))).toEqual([5, 6]);
    const src = new Uint8Array([7]);
    const copy = cloneBytes(src);
    src[0] = 8;
    expect(copy[0]).toBe(7);
  });
});
