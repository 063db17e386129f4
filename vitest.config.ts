import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/tests/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      DB_CONNECT_DELAY_MS: "0",
    },
  },
});
