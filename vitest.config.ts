import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      ADMIN_SECRET: "test-secret",
      PUBLISH_EVENTS: "false",
    },
  },
});
