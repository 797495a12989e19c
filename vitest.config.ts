import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: [
      "__tests__/unit/**/*.test.ts",
      "__tests__/integration/**/*.test.ts",
    ],
    env: {
      LOG_LEVEL: "silent",
    },
    coverage: {
      include: ["lib/**/*.ts", "features/**/*.ts"],
      exclude: ["lib/platform/logger.ts"],
    },
  },
});
