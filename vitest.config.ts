import { defineConfig } from "vitest/config";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@sovereign/shared": resolve(__dirname, "packages/shared/src/index.ts"),
      "@sovereign/module-sovereign-memory": resolve(__dirname, "modules/sovereign-memory/src/index.ts"),
    },
  },
  test: {
    globals: true,
    include: ["packages/*/src/**/*.test.ts", "modules/*/src/**/*.test.ts"],
  },
});
