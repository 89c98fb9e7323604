import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 20000,
    hookTimeout: 10000,
    env: {
      LOG_WINDOW_LOG_LEVEL: "error",
    },
  },
});
