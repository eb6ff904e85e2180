#!/usr/bin/env node
/**
 * cli.ts — trip-ingest entry point
 *
 * Usage:
 *   trip-ingest [dataDir] [--db <path>]
 *
 * Exits 0 once every eligible file has been processed (per-file failures are
 * logged, not reflected in the exit status); exits 1 on a fatal error.
 */

import { resolveConfig } from "./config.js";
import { describeError } from "./errors.js";
import { log } from "./logger.js";
import { runIngestion } from "./services/ingest-run.js";

async function main(): Promise<void> {
  const config = resolveConfig(process.argv.slice(2));
  log.boot.info({ dataDir: config.dataDir, database: config.databasePath }, "trip-ingest starting");

  const summary = await runIngestion({
    dataDir: config.dataDir,
    databasePath: config.databasePath,
    tableName: config.tableName,
    emptyWaitMs: config.emptyWaitMs,
  });

  const line = {
    files: summary.files,
    imported: summary.imported,
    skipped: summary.skipped,
    empty: summary.empty,
    failed: summary.failed,
  };
  if (summary.failed > 0) {
    log.boot.warn(line, "run finished with failures");
  } else {
    log.boot.info(line, "run finished");
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    log.boot.fatal({ err: describeError(err) }, "fatal ingestion error");
    process.exit(1);
  },
);
