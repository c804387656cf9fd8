/**
 * @file HostFS runtime guards
 */
import type { HostFS } from "./types";
import { isObject } from "../util/guards";

const REQUIRED = ["exists", "isDirectory", "mkdirp", "copyFile", "writeFile", "openWrite", "readFile"] as const;

/** Narrow unknown to HostFS by checking required methods. */
export function isHostFS(x: unknown): x is HostFS {
  if (!isObject(x)) {
    return false;
  }
  return REQUIRED.every((k) => typeof x[k] === "function");
}
