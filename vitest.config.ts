import { defineConfig } from "vitest/config";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = resolve(fileURLToPath(import.meta.url), "..");

export default defineConfig({
  resolve: {
    alias: {
      "@decay-market/sdk": resolve(__dirname, "packages/sdk/src/index.ts"),
      "@decay-market/seller": resolve(__dirname, "packages/seller/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist", ".git"],
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
      },
    },
    hookTimeout: 30_000,
    testTimeout: 30_000,
    teardownTimeout: 10_000,
  },
});
