import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const shared = (path: string): string =>
  fileURLToPath(new URL(`./packages/shared/src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@logquery/shared/middleware": shared("middleware/index.ts"),
      "@logquery/shared/utils": shared("utils/index.ts"),
      "@logquery/shared": shared("index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
