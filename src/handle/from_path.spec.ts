/**
 * @file Tests for building handles from local files
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join as joinPath } from "node:path";
import { fileHandleFromPath } from "./from_path";
import { getPath } from "./path";

describe("handle/from_path", () => {
  const ctx: { dir: string } = { dir: "" };

  beforeEach(async () => {
    ctx.dir = await mkdtemp(joinPath(tmpdir(), "anyfile-from-"));
  });

  afterEach(async () => {
    await rm(ctx.dir, { recursive: true, force: true });
  });

  it("takes name and size from the file", async () => {
    const p = joinPath(ctx.dir, "notes.md");
    await writeFile(p, "hello");
    const h = await fileHandleFromPath(p);
    expect(h.name).toBe("notes.md");
    expect(h.size).toBe(5);
    expect(getPath(h)).toBe(p);
    expect(h.isWeb).toBe(false);
  });

  it("accepts a display name and identifier", async () => {
    const p = joinPath(ctx.dir, "tmp-123");
    await writeFile(p, "");
    const h = await fileHandleFromPath(p, { name: "photo.jpg", identifier: "content://media/1" });
    expect(h.name).toBe("photo.jpg");
    expect(h.identifier).toBe("content://media/1");
  });

  it("rejects directories and missing files", async () => {
    await expect(fileHandleFromPath(ctx.dir)).rejects.toThrow(/not a regular file/);
    await expect(fileHandleFromPath(joinPath(ctx.dir, "missing"))).rejects.toMatchObject({ code: "ENOENT" });
  });
});
