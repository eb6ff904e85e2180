/**
 * logger.ts — Structured Logging for trip-ingest
 *
 * Built on pino.
 *
 * Configuration:
 *   TRIP_INGEST_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   TRIP_INGEST_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   TRIP_INGEST_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("run starting");
 *   log.ingest.info({ file: "yellow_2024-01.parquet", rows: 120 }, "imported");
 *   log.ingest.error({ file, err: describeError(err) }, "failed");
 *
 * Subsystem loggers:
 *   log.boot, log.ingest, log.ledger, log.db
 */

import pino from "pino";
import type { Logger } from "pino";
import { bootstrapConfigSync } from "./config.js";

// ─── Configuration ──────────────────────────────────────────────

const config = bootstrapConfigSync();

/** Build pino transport configuration */
function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!config.logPretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: config.logLevel,
  ...(transport ? { transport } : {}),
  base: { service: "trip-ingest" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.ingest.info("table ready")
 *   → { level: 30, subsystem: "ingest", msg: "table ready", ... }
 */
export const log = {
  /** Startup, configuration and run summary */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Per-file discovery, projection and bulk load */
  ingest: rootLogger.child({ subsystem: "ingest" }),
  /** Import ledger checks */
  ledger: rootLogger.child({ subsystem: "ledger" }),
  /** Connection lifecycle and table provisioning */
  db: rootLogger.child({ subsystem: "db" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
