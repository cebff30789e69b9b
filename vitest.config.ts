import { defineConfig } from "vitest/config";
import { resolve } from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": resolve(__dirname, "src"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    setupFiles: ["./tests/vitest.setup.ts"],
    env: {
      LOG_LEVEL: "debug",
      LOG_CONSOLE: "false",
      LOG_FILE_OUTPUT: "false",
      LOG_MAX_THROTTLE_COUNT: "100000",
    },
    pool: "threads",
    testTimeout: 10000,
    hookTimeout: 10000,
    retry: process.env.CI ? 2 : 0,
    sequence: {
      shuffle: false,
    },
  },
});
