import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      CONDUCTOR_LOG_LEVEL: "silent",
    },
  },
});
