import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@idxmeta/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url)),
      "@idxmeta/testkit": fileURLToPath(new URL("./packages/testkit/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
