// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { fileURLToPath } from "url";

import { defineConfig } from "vitest/config";

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  // Workspace packages resolve to their sources, as the `tollgate-source` export condition does for tsc
  resolve: {
    alias: {
      "@tollgate/core": source("core"),
      "@tollgate/api": source("api"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/unit/**/*.test.ts"],
    env: {
      TOLLGATE_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["packages/core/src/router/**"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
      reporter: ["text", "lcov", "html"],
    },
  },
});
