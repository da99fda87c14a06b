import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    testTimeout: 10000,
  },
});
