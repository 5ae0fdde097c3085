import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      EUTILS_LOG_LEVEL: "crit",
    },
  },
});
