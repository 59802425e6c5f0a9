// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes CAE_* settings available to tests
  const env = loadEnv(mode, process.cwd(), "CAE_");

  return {
    test: {
      env,
      // Runaway programs are guarded by step limits, not by the runner
      testTimeout: 20_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
