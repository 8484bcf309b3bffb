import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Clear importer env vars so config resolution in tests starts from defaults.
    // Tests that need a value pass an explicit env object to resolveConfig().
    env: {
      ULS_SOURCE_URL: "",
      ULS_LOCK_ENABLED: "",
      ULS_SKIP_IF_UNCHANGED: "",
      ULS_META_PATH: "",
      ULS_STATE_PATH: "",
      ULS_NAMESPACE: "",
      ULS_SCHEMA_PATH: "",
      ULS_PROBE_TIMEOUT_MS: "",
      ULS_DOWNLOAD_TIMEOUT_MS: "",
      ULS_MIN_REUSE_BYTES: "",
      DATA_DIR: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        // scripts/uls-import.ts and the pg adapter need a live database
        lines: 60,
        functions: 60,
        branches: 60,
        statements: 60,
        perFile: false,
      },
    },
    pool: "forks",
    testTimeout: 10000,
  },
});
