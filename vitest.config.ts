import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@conninv/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/test/**/*.spec.ts"],
    environment: "node",
    // document scans start child processes through the tsx loader
    testTimeout: 30_000,
  },
});
