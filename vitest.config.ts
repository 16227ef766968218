import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "services/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["services/analyzer/src/**/*.ts", "packages/shared/src/**/*.ts"],
      exclude: ["**/__tests__/**", "services/analyzer/src/index.ts"],
    },
  },
  resolve: {
    alias: {
      "@range-insights/shared": path.resolve(root, "packages/shared/src/index.ts"),
      "@range-insights/analyzer": path.resolve(root, "services/analyzer/src/index.ts"),
    },
  },
});
