import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@warden-core": fileURLToPath(
        new URL("./apps/warden-core", import.meta.url),
      ),
    },
  },
  test: {
    include: [
      "apps/*/src/**/*.test.ts",
      "apps/*/tests/**/*.test.ts",
      "packages/*/src/**/*.test.ts",
      "packages/*/tests/**/*.test.ts",
    ],
    // better-sqlite3 is a native addon; keep each file in its own process.
    pool: "forks",
    testTimeout: 10_000,
  },
});
