/**
 * @file Node.js host filesystem
 */
import type { Stats } from "node:fs";
import { copyFile, mkdir, open, readFile, stat, writeFile } from "node:fs/promises";
import type { HostFS, WriteSink } from "./types";
import { hasErrorCode } from "../util/guards";
import { cloneBytes } from "../util/bytes";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

function isMissingError(error: unknown): boolean {
  return hasErrorCode(error) && MISSING_CODES.has(error.code);
}

/** Stat that maps ENOENT/ENOTDIR to undefined; every other error propagates unmodified. */
async function statIfPresent(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissingError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Node HostFS backed by `node:fs/promises`.
 * `exists` is true only for regular files (symlinks are followed).
 */
export function createNodeHostFS(): HostFS {
  return {
    async exists(path: string) {
      const st = await statIfPresent(path);
      return st?.isFile() ?? false;
    },
    async isDirectory(path: string) {
      const st = await statIfPresent(path);
      return st?.isDirectory() ?? false;
    },
    async mkdirp(dir: string) {
      await mkdir(dir, { recursive: true });
    },
    async copyFile(source: string, target: string) {
      await copyFile(source, target);
    },
    async writeFile(path: string, data: Uint8Array) {
      await writeFile(path, data);
    },
    async openWrite(path: string): Promise<WriteSink> {
      const fd = await open(path, "w");
      const state = { closed: false };
      return {
        async write(chunk) {
          await fd.writeFile(chunk);
        },
        async flush() {
          await fd.sync();
        },
        async close() {
          if (state.closed) {
            return;
          }
          state.closed = true;
          await fd.close();
        },
      };
    },
    async readFile(path: string) {
      return cloneBytes(await readFile(path));
    },
  };
}
