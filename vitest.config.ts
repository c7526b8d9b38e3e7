import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    hookTimeout: 30000,
    // Workspace packages resolve to their sources so tests need no build.
    alias: {
      "@breadlog/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
      "@breadlog/cli": fileURLToPath(new URL("./packages/cli/src/index.ts", import.meta.url)),
    },
  },
});
