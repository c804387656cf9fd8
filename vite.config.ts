/**
 * @file Vite library build configuration
 */

import { defineConfig } from "vite";
import dts from "vite-plugin-dts";
import { getViteEntries, getAllExternals } from "./build.entries";
import type { Plugin } from "vite";
export default defineConfig({
  plugins: [
    dts({
      entryRoot: "src",
      outDir: "dist",
      include: ["src"],
      exclude: ["**/*.spec.*", "src/handle/testing.ts", "spec", "node_modules", "dist"],
      tsconfigPath: "tsconfig.json",
      rollupTypes: false,
    }),
  ] as Plugin[],
  build: {
    outDir: "dist",
    lib: {
      entry: getViteEntries(),
      formats: ["cjs", "es"],
    },
    rollupOptions: {
      external: getAllExternals(),
    },
  },
});
