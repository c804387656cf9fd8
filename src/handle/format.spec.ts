/**
 * @file Tests for display helpers
 */
import { createFileHandle } from "./create";
import { formatFileHandle, getExtension } from "./format";
import { trackedStream } from "./testing";

describe("handle/format", () => {
  it("derives the extension from the last dot", () => {
    expect(getExtension(createFileHandle({ name: "archive.tar.gz", size: 0 }))).toBe("gz");
    expect(getExtension(createFileHandle({ name: "README", size: 0 }))).toBe("README");
    expect(getExtension(createFileHandle({ name: "trailing.", size: 0 }))).toBe("");
  });

  it("formats non-web handles with their path", () => {
    const h = createFileHandle({ name: "a.txt", size: 5, path: "/tmp/a.txt", bytes: new Uint8Array(5) });
    expect(formatFileHandle(h)).toBe("FileHandle(path /tmp/a.txt, name: a.txt, bytes: 5 bytes, byteStream: none, size: 5)");
  });

  it("omits the path for web handles", () => {
    const h = createFileHandle({ name: "w.txt", size: 3, byteStream: trackedStream([]).stream, isWeb: true });
    expect(formatFileHandle(h)).toBe("FileHandle(name: w.txt, bytes: none, byteStream: present, size: 3)");
  });
});
