/**
 * @file Build entry catalog - entry points and their target environments
 *
 * Single source of truth for the Vite library build (entries and externals).
 *
 * Target types:
 * - "node": needs node:* modules (the Node host, the default options)
 * - "browser": relies on web APIs only
 * - "universal": runs anywhere
 */

export type BuildTarget = "node" | "browser" | "universal";

export type EntryConfig = {
  /**
   * Entry file path relative to project root
   */
  path: string;
  /**
   * Target environments where this entry can run
   */
  targets: BuildTarget[];
  description?: string;
  /**
   * External dependencies for this entry (passed to Rollup)
   */
  external?: string[];
};

export type EntryCatalog = {
  [entryName: string]: EntryConfig;
};

export const entries: EntryCatalog = {
  index: {
    path: "src/index.ts",
    targets: ["node"],
    description: "Main library entry point",
  },

  // Handle operations default to the Node host
  "handle/index": {
    path: "src/handle/index.ts",
    targets: ["node"],
    description: "FileHandle construction, exists/copy, equality",
  },

  "host/node": {
    path: "src/host/node.ts",
    targets: ["node"],
    description: "Node.js host filesystem",
  },

  "host/memory": {
    path: "src/host/memory.ts",
    targets: ["universal"],
    description: "In-memory host filesystem (works everywhere)",
  },

  "host/guards": {
    path: "src/host/guards.ts",
    targets: ["universal"],
    description: "Runtime guards for HostFS",
  },

  "web/index": {
    path: "src/web/index.ts",
    targets: ["browser"],
    description: "Blob/ReadableStream helpers for web handles",
  },

  "logging/logger": {
    path: "src/logging/logger.ts",
    targets: ["universal"],
    description: "Tagged console logger",
  },
};

/**
 * Get all entries that should work in a specific target environment
 */
export function getEntriesForTarget(target: BuildTarget): string[] {
  return Object.entries(entries)
    .filter(([, config]) => config.targets.includes(target) || config.targets.includes("universal"))
    .map(([name]) => name);
}

/**
 * Get all external dependencies for all entries
 */
export function getAllExternals(): Array<string | RegExp> {
  const externals = new Set<string | RegExp>();
  externals.add(/node:.+/);
  for (const config of Object.values(entries)) {
    config.external?.forEach((ext) => externals.add(ext));
  }
  return Array.from(externals);
}

/**
 * Convert entries to Vite lib entry format
 */
export function getViteEntries(): Record<string, string> {
  return Object.fromEntries(Object.entries(entries).map(([name, config]) => [name, config.path]));
}
