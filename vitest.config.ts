import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const root = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@cairn/sdk/testing": root("./packages/sdk/src/testing/index.ts"),
      "@cairn/sdk": root("./packages/sdk/src/index.ts"),
      "@cairn/shared": root("./packages/shared/src/index.ts"),
      "@cairn/core": root("./packages/core/src/index.ts"),
    },
  },
});
