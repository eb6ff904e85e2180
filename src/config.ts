/**
 * config.ts — Configuration Resolution
 *
 * Single source of truth for all configuration. Priority chain:
 *   1. Command-line argument     ← highest
 *   2. Environment variable
 *   3. Built-in default          ← lowest
 *
 * Rules:
 * - No `process.env` reads outside this file
 * - The input directory is the only functional input; the canonical
 *   schema, table name and defaults are fixed at build time
 * - Config object is fully typed
 */

import * as path from "node:path";

// ─── Configuration Interface ────────────────────────────────────

export interface IngestConfig {
  // ── Input / Output ──────────────────────────────────────────
  /** Directory scanned for .parquet files (default: "data") */
  dataDir: string;
  /** DuckDB database file (default: <dataDir>/taxi_trips.duckdb) */
  databasePath: string;
  /** Target table */
  tableName: string;
  /** How long to linger before exiting when there is nothing to ingest */
  emptyWaitMs: number;

  // ── System ──────────────────────────────────────────────────
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;

  // ── Logging ─────────────────────────────────────────────────
  /** Log level (silent, debug, info, warn, error) */
  logLevel: string;
  logPretty: boolean;
}

export const DEFAULT_DATA_DIR = "data";
export const DATABASE_FILE_NAME = "taxi_trips.duckdb";
export const TRIP_TABLE_NAME = "raw_taxi_trips";
export const EMPTY_DIR_WAIT_MS = 5000;

type Env = Record<string, string | undefined>;

// ─── Resolution Helpers ─────────────────────────────────────────

function resolveLogLevel(env: Env, isTest: boolean, isDev: boolean): string {
  // Explicit level takes priority
  if (env.TRIP_INGEST_LOG_LEVEL) {
    return env.TRIP_INGEST_LOG_LEVEL;
  }
  const debugEnv = (env.TRIP_INGEST_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

function resolveLogPretty(env: Env, isTest: boolean, isDev: boolean): boolean {
  if (isTest) return false;
  return (
    env.TRIP_INGEST_LOG_PRETTY === "true" ||
    (env.TRIP_INGEST_LOG_PRETTY !== "false" && isDev)
  );
}

/** Extract a --name=value or `--name value` flag from args. */
export function getFlag(args: string[], name: string): string | undefined {
  const flag = args.find(a => a.startsWith(`--${name}=`));
  if (flag) return flag.split("=").slice(1).join("=");

  const exactIndex = args.findIndex(a => a === `--${name}`);
  if (exactIndex >= 0) {
    const next = args[exactIndex + 1];
    if (next && !next.startsWith("--")) return next;
  }

  return undefined;
}

/** First argument that is neither a flag nor a flag's value. */
function firstPositional(args: string[]): string | undefined {
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === undefined) continue;
    if (arg.startsWith("--")) {
      if (!arg.includes("=")) index += 1;
      continue;
    }
    return arg;
  }
  return undefined;
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve complete configuration.
 *
 * @param args - CLI arguments after the script name (`process.argv.slice(2)`)
 * @param env  - Environment (defaults to `process.env`)
 */
export function resolveConfig(args: string[] = [], env: Env = process.env): IngestConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  const dataDir = path.resolve(firstPositional(args) || env.TRIP_INGEST_DATA_DIR || DEFAULT_DATA_DIR);
  const databasePath = path.resolve(
    getFlag(args, "db") || env.TRIP_INGEST_DB_PATH || path.join(dataDir, DATABASE_FILE_NAME),
  );

  return {
    dataDir,
    databasePath,
    tableName: TRIP_TABLE_NAME,
    emptyWaitMs: EMPTY_DIR_WAIT_MS,
    nodeEnv,
    isTest,
    isDev,
    logLevel: resolveLogLevel(env, isTest, isDev),
    logPretty: resolveLogPretty(env, isTest, isDev),
  };
}

/**
 * Env-only config for early init (logger bootstrap).
 */
export function bootstrapConfigSync(): IngestConfig {
  return resolveConfig([], process.env);
}
