/**
 * @file In-memory host filesystem
 *
 * Paths use `/` separators and are normalised (`.`/`..` segments resolved,
 * duplicate separators collapsed). Directories are tracked explicitly so a
 * write into a missing directory fails like a real filesystem would.
 */
import type { HostFS, WriteSink } from "./types";
import { cloneBytes, concatBytes, toUint8 } from "../util/bytes";

type FsError = Error & { code: string };

function fsError(code: string, op: string, path: string): FsError {
  return Object.assign(new Error(`${code}: ${op} '${path}'`), { code });
}

/** Normalise a `/`-separated path. */
export function normalizeMemoryPath(path: string): string {
  const absolute = path.startsWith("/");
  const segments = path.split("/").reduce<string[]>((acc, seg) => {
    if (seg === "" || seg === ".") {
      return acc;
    }
    if (seg === "..") {
      if (acc.length > 0 && acc[acc.length - 1] !== "..") {
        return acc.slice(0, -1);
      }
      return absolute ? acc : [...acc, ".."];
    }
    return [...acc, seg];
  }, []);
  const joined = segments.join("/");
  return absolute ? `/${joined}` : joined;
}

/** Parent directory of a normalised path ("" or "/" for top-level entries). */
export function parentOfMemoryPath(path: string): string {
  const idx = path.lastIndexOf("/");
  if (idx < 0) {
    return "";
  }
  return idx === 0 ? "/" : path.slice(0, idx);
}

/** In-memory HostFS. Why: filesystem-free backend for tests and web runtimes. */
export function createMemoryHostFS(initial?: Record<string, Uint8Array | ArrayBuffer>): HostFS {
  const files = new Map<string, Uint8Array>();
  const dirs = new Set<string>(["", "/"]);

  function addDirs(dir: string): void {
    if (dirs.has(dir)) {
      return;
    }
    addDirs(parentOfMemoryPath(dir));
    dirs.add(dir);
  }

  function requireParent(op: string, path: string): void {
    const parent = parentOfMemoryPath(path);
    if (files.has(parent)) {
      throw fsError("ENOTDIR", op, path);
    }
    if (!dirs.has(parent)) {
      throw fsError("ENOENT", op, path);
    }
    if (dirs.has(path)) {
      throw fsError("EISDIR", op, path);
    }
  }

  if (initial) {
    for (const [k, v] of Object.entries(initial)) {
      const p = normalizeMemoryPath(k);
      addDirs(parentOfMemoryPath(p));
      files.set(p, cloneBytes(toUint8(v)));
    }
  }

  return {
    async exists(path: string) {
      return files.has(normalizeMemoryPath(path));
    },
    async isDirectory(path: string) {
      return dirs.has(normalizeMemoryPath(path));
    },
    async mkdirp(dir: string) {
      const p = normalizeMemoryPath(dir);
      if (files.has(p)) {
        throw fsError("EEXIST", "mkdir", dir);
      }
      addDirs(p);
    },
    async copyFile(source: string, target: string) {
      const data = files.get(normalizeMemoryPath(source));
      if (!data) {
        throw fsError("ENOENT", "copyfile", source);
      }
      const t = normalizeMemoryPath(target);
      requireParent("copyfile", t);
      files.set(t, cloneBytes(data));
    },
    async writeFile(path: string, data: Uint8Array) {
      const p = normalizeMemoryPath(path);
      requireParent("open", p);
      files.set(p, cloneBytes(data));
    },
    async openWrite(path: string): Promise<WriteSink> {
      const p = normalizeMemoryPath(path);
      requireParent("open", p);
      files.set(p, new Uint8Array());
      const pending: Uint8Array[] = [];
      const state = { closed: false };
      const commit = (): void => {
        const prev = files.get(p) ?? new Uint8Array();
        files.set(p, concatBytes([prev, ...pending]));
        pending.length = 0;
      };
      return {
        async write(chunk) {
          if (state.closed) {
            throw new Error(`write after close: ${path}`);
          }
          pending.push(cloneBytes(chunk));
        },
        async flush() {
          commit();
        },
        async close() {
          if (state.closed) {
            return;
          }
          commit();
          state.closed = true;
        },
      };
    },
    async readFile(path: string) {
      const p = normalizeMemoryPath(path);
      const data = files.get(p);
      if (!data) {
        throw fsError(dirs.has(p) ? "EISDIR" : "ENOENT", "open", path);
      }
      return cloneBytes(data);
    },
  };
}
