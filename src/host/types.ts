/**
 * @file Host filesystem abstraction
 * Why: keep the handle's source policy independent of Node, browsers and test doubles.
 */

/** Writable sink opened on a target file; `close` must be called on every exit path. */
export type WriteSink = {
  write(chunk: Uint8Array): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
};

export type HostFS = {
  /** Whether a regular file is present at `path`. Directories report false. */
  exists(path: string): Promise<boolean>;
  /** Whether a directory is present at `path`. */
  isDirectory(path: string): Promise<boolean>;
  /** Create `dir` and every missing ancestor; existing directories are not an error. */
  mkdirp(dir: string): Promise<void>;
  /** Copy `source` to `target` with the host's native primitive. */
  copyFile(source: string, target: string): Promise<void>;
  writeFile(path: string, data: Uint8Array): Promise<void>;
  openWrite(path: string): Promise<WriteSink>;
  readFile(path: string): Promise<Uint8Array>;
};

/** Reference to a file written by a host, returned from `copy`. */
export type FileRef = {
  readonly path: string;
  exists(): Promise<boolean>;
  read(): Promise<Uint8Array>;
};
