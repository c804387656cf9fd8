/**
 * @file Tests for equality and hashing
 */
import { createFileHandle } from "./create";
import { fileHandleEquals, fileHandleHash } from "./equality";
import { trackedStream } from "./testing";

describe("handle/equality", () => {
  it("compares bytes by content", () => {
    const a = createFileHandle({ name: "a", size: 2, path: "/a", bytes: new Uint8Array([1, 2]) });
    const b = createFileHandle({ name: "a", size: 2, path: "/a", bytes: new Uint8Array([1, 2]) });
    const c = createFileHandle({ name: "a", size: 2, path: "/a", bytes: new Uint8Array([1, 3]) });
    expect(fileHandleEquals(a, b)).toBe(true);
    expect(fileHandleHash(a)).toBe(fileHandleHash(b));
    expect(fileHandleEquals(a, c)).toBe(false);
  });

  it("compares streams by identity", () => {
    const s1 = trackedStream([[1]]).stream;
    const s2 = trackedStream([[1]]).stream;
    const a = createFileHandle({ name: "s", size: 1, byteStream: s1 });
    const b = createFileHandle({ name: "s", size: 1, byteStream: s1 });
    const c = createFileHandle({ name: "s", size: 1, byteStream: s2 });
    expect(fileHandleEquals(a, b)).toBe(true);
    expect(fileHandleHash(a)).toBe(fileHandleHash(b));
    expect(fileHandleEquals(a, c)).toBe(false);
  });

  it("distinguishes every scalar field", () => {
    const base = { name: "f.txt", size: 1, path: "/f.txt", identifier: "id-1" };
    const h = createFileHandle(base);
    expect(fileHandleEquals(h, createFileHandle(base))).toBe(true);
    expect(fileHandleEquals(h, createFileHandle({ ...base, name: "g.txt" }))).toBe(false);
    expect(fileHandleEquals(h, createFileHandle({ ...base, size: 2 }))).toBe(false);
    expect(fileHandleEquals(h, createFileHandle({ ...base, path: "/g.txt" }))).toBe(false);
    expect(fileHandleEquals(h, createFileHandle({ ...base, identifier: "id-2" }))).toBe(false);
    expect(fileHandleEquals(h, createFileHandle({ ...base, bytes: new Uint8Array() }))).toBe(false);
  });

  it("ignores the path between web handles and hashes them all to 0", () => {
    const a = createFileHandle({ name: "w", size: 1, path: "/one", isWeb: true });
    const b = createFileHandle({ name: "w", size: 1, path: "/two", isWeb: true });
    const other = createFileHandle({ name: "z", size: 9, isWeb: true });
    expect(fileHandleEquals(a, b)).toBe(true);
    expect(fileHandleHash(a)).toBe(0);
    expect(fileHandleHash(other)).toBe(0);
    expect(fileHandleEquals(a, other)).toBe(false);
  });

  it("never equates web and non-web handles", () => {
    const web = createFileHandle({ name: "x", size: 0, isWeb: true });
    const local = createFileHandle({ name: "x", size: 0 });
    expect(fileHandleEquals(web, local)).toBe(false);
    expect(fileHandleEquals(local, web)).toBe(false);
  });
});
