/**
 * @file Vitest testing framework configuration
 *
 * Globals are enabled (describe/it/expect/vi without imports) and tests run in
 * the Node environment so the Node host can touch temp directories.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
  },
});
