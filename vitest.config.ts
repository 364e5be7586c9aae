import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages are tested from their sources, not their build output
    alias: {
      "@fsfault/shared": fileURLToPath(
        new URL("./packages/shared/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
    reporters: ["default"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/__tests__/**", "packages/*/src/cli/index.ts"],
      reporter: ["text", "json", "clover"],
      reportsDirectory: "coverage",
    },
  },
});
