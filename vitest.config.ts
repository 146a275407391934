import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const sourceEntry = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.*", "**/test/**"],
      reporter: ["text", "html", "lcov"],
    },
    // Workspace packages resolve to their TypeScript sources, no build first
    alias: {
      "@spanlight/source": sourceEntry("source"),
      "@spanlight/report": sourceEntry("report"),
    },
  },
});
