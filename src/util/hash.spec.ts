/**
 * @file Tests for hashing helpers
 */
import { combineHashes, hash32, hashBytes, hashString, identityHash } from "./hash";

describe("util/hash", () => {
  it("FNV-1a matches known vectors", () => {
    expect(hashString("")).toBe(0x811c9dc5);
    expect(hashString("a")).toBe(0xe40c292c);
    expect(hashBytes(new Uint8Array([0x61]))).toBe(0xe40c292c);
  });

  it("hash32 is deterministic and unsigned", () => {
    expect(hash32(42)).toBe(hash32(42));
    expect(hash32(0xffffffff)).toBeGreaterThanOrEqual(0);
  });

  it("combineHashes depends on order", () => {
    expect(combineHashes([1, 2])).toBe(combineHashes([1, 2]));
    expect(combineHashes([1, 2])).not.toBe(combineHashes([2, 1]));
  });

  it("identityHash is stable per object and differs between objects", () => {
    const a = {};
    const b = {};
    expect(identityHash(a)).toBe(identityHash(a));
    expect(identityHash(a)).not.toBe(identityHash(b));
  });
});
