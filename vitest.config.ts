// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes them available to tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      // Server tests bind a loopback port
      testTimeout: 10_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
