/**
 * ingest-run.ts — One ingestion run over a directory of Parquet files
 *
 * Sequence: scan → open database → provision table → build mapping →
 * for each file (sorted by name): ledger check → ingest.
 *
 * Per-file failures are isolated and the run continues. Registry,
 * provisioning and ledger failures abort the run before or between files.
 */

import { mkdir, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { withDatabase } from "../db.js";
import { log } from "../logger.js";
import { TAXI_TRIP_SCHEMA, type TripSchema } from "../schema/trip-schema.js";
import { isImported } from "../stores/import-ledger.js";
import { ensureTripTable } from "../stores/trip-table.js";
import { buildFieldMapping } from "./field-mapping.js";
import { ingestFile, type IngestOutcome } from "./trip-ingest.js";

export const SOURCE_FILE_EXTENSION = ".parquet";

export interface RunOptions {
  dataDir: string;
  databasePath: string;
  tableName: string;
  /** Linger before returning when the directory holds nothing to ingest */
  emptyWaitMs: number;
  schema?: TripSchema;
}

export interface RunSummary {
  files: number;
  imported: number;
  skipped: number;
  empty: number;
  failed: number;
  outcomes: IngestOutcome[];
}

async function isLinkedFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    log.boot.warn({ path, err: err instanceof Error ? err.message : String(err) }, "skipping unreadable symlink");
    return false;
  }
}

/**
 * Parquet files directly inside `dataDir`, sorted by name. Symlinks are
 * followed and kept when they resolve to a file.
 */
export async function listSourceFiles(dataDir: string): Promise<string[]> {
  const entries = await readdir(dataDir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (!entry.name.endsWith(SOURCE_FILE_EXTENSION)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(join(dataDir, entry.name))))) {
      names.push(entry.name);
    }
  }
  return names.sort();
}

function summarize(outcomes: IngestOutcome[]): RunSummary {
  const count = (status: IngestOutcome["status"]) => outcomes.filter((o) => o.status === status).length;
  return {
    files: outcomes.length,
    imported: count("imported"),
    skipped: count("skipped"),
    empty: count("empty"),
    failed: count("failed"),
    outcomes,
  };
}

export async function runIngestion(options: RunOptions): Promise<RunSummary> {
  const schema = options.schema ?? TAXI_TRIP_SCHEMA;
  await mkdir(options.dataDir, { recursive: true });

  // Registry problems abort before the database is touched
  const mapping = buildFieldMapping(schema);

  return withDatabase(options.databasePath, async (connection) => {
    await ensureTripTable(connection, options.tableName, schema);

    const fileNames = await listSourceFiles(options.dataDir);
    if (fileNames.length === 0) {
      log.boot.info({ dataDir: options.dataDir }, "no Parquet files found, nothing to ingest");
      await sleep(options.emptyWaitMs);
      return summarize([]);
    }

    log.boot.info({ dataDir: options.dataDir, files: fileNames.length }, "ingestion starting");

    const outcomes: IngestOutcome[] = [];
    for (const fileName of fileNames) {
      // LedgerCheckError propagates: without an answer the file can be neither skipped nor loaded
      if (await isImported(connection, options.tableName, fileName)) {
        log.ingest.info({ file: fileName }, "skipped, already imported");
        outcomes.push({ status: "skipped", file: fileName, reason: "already_imported" });
        continue;
      }

      log.ingest.info({ file: fileName }, "processing");
      outcomes.push(
        await ingestFile(connection, join(options.dataDir, fileName), mapping, {
          tableName: options.tableName,
          schema,
        }),
      );
    }

    return summarize(outcomes);
  });
}
