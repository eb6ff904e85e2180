import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Keep config resolution deterministic regardless of the caller's shell
    env: {
      TRIP_INGEST_DATA_DIR: "",
      TRIP_INGEST_DB_PATH: "",
      TRIP_INGEST_LOG_LEVEL: "",
      TRIP_INGEST_LOG_PRETTY: "",
      TRIP_INGEST_DEBUG: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    // DuckDB is a native addon; isolate each file in its own process
    pool: "forks",
    fileParallelism: false,
    testTimeout: 20000,
  },
});
