/**
 * trip-ingest.ts — Per-file bulk load into the canonical trip table
 *
 * Steps for one Parquet file:
 *   1. Discover its column names with DESCRIBE, reading no rows
 *   2. Resolve the projection against the field mapping
 *   3. Render INSERT INTO <table> (...) SELECT <projection> FROM read_parquet(<file>)
 *   4. Run it as one statement inside a transaction, so the file lands whole or not at all
 *
 * Failures are logged and returned as a "failed" outcome; the file stays
 * un-imported and is retried on the next run. A file with no rows lands
 * nothing, leaves no provenance behind, and is reported "empty" every run.
 */

import { basename } from "node:path";
import { queryRows, withTransaction, type Connection } from "../db.js";
import { DiscoveryError, IngestionError, describeError, type IngestErrorCodeValue } from "../errors.js";
import { log } from "../logger.js";
import { TAXI_TRIP_SCHEMA, type TripSchema } from "../schema/trip-schema.js";
import { TRIP_TABLE_NAME } from "../config.js";
import { countRows } from "../stores/import-ledger.js";
import {
  resolveProjection,
  unmappedColumns,
  type FieldMappingTable,
  type ProjectionItem,
} from "./field-mapping.js";
import { projectionColumns, quoteIdentifier, quoteLiteral, renderProjection } from "./sql-render.js";

// ─── Types ──────────────────────────────────────────────────

export type IngestOutcome =
  | { status: "imported"; file: string; rows: number; durationMs: number }
  | { status: "skipped"; file: string; reason: "already_imported" }
  | { status: "empty"; file: string; durationMs: number }
  | { status: "failed"; file: string; error: { code: IngestErrorCodeValue; message: string } };

export interface IngestFileOptions {
  tableName?: string;
  schema?: TripSchema;
}

// ─── SQL ────────────────────────────────────────────────────

function parquetSource(filePath: string): string {
  return `read_parquet(${quoteLiteral(filePath)})`;
}

export function buildInsertSql(tableName: string, projection: readonly ProjectionItem[], filePath: string): string {
  const columns = projectionColumns(projection).map(quoteIdentifier).join(", ");
  const expressions = projection.map(renderProjection).join(",\n  ");
  return `INSERT INTO ${quoteIdentifier(tableName)} (${columns})\nSELECT\n  ${expressions}\nFROM ${parquetSource(filePath)}`;
}

// ─── Steps ──────────────────────────────────────────────────

/** Column names of a Parquet file, without materializing any rows. */
export async function discoverColumns(connection: Connection, filePath: string): Promise<string[]> {
  try {
    const rows = await queryRows(connection, `DESCRIBE SELECT * FROM ${parquetSource(filePath)}`);
    return rows.map((row) => String(row.column_name));
  } catch (err) {
    throw new DiscoveryError(filePath, { cause: err });
  }
}

async function bulkLoad(
  connection: Connection,
  tableName: string,
  sql: string,
  filePath: string,
  sourceFile: string,
): Promise<number> {
  try {
    return await withTransaction(connection, async (tx) => {
      await tx.run(sql);
      return countRows(tx, tableName, sourceFile);
    });
  } catch (err) {
    throw new IngestionError(filePath, { cause: err });
  }
}

// ─── Pipeline ───────────────────────────────────────────────

export async function ingestFile(
  connection: Connection,
  filePath: string,
  mapping: FieldMappingTable,
  options: IngestFileOptions = {},
): Promise<IngestOutcome> {
  const tableName = options.tableName ?? TRIP_TABLE_NAME;
  const schema = options.schema ?? TAXI_TRIP_SCHEMA;
  const sourceFile = basename(filePath);
  const start = Date.now();

  try {
    const columns = await discoverColumns(connection, filePath);
    const dropped = unmappedColumns(columns, mapping);
    if (dropped.length > 0) {
      log.ingest.debug({ file: sourceFile, dropped }, "ignoring unrecognized columns");
    }

    const projection = resolveProjection(columns, mapping, sourceFile, schema);
    const defaulted = projection.flatMap((item) => (item.kind === "default" ? [item.field.name] : []));
    if (defaulted.length > 0) {
      log.ingest.debug({ file: sourceFile, defaulted }, "columns absent, using defaults");
    }

    const sql = buildInsertSql(tableName, projection, filePath);
    const rows = await bulkLoad(connection, tableName, sql, filePath, sourceFile);
    const durationMs = Date.now() - start;

    if (rows === 0) {
      log.ingest.warn({ file: sourceFile, durationMs }, "empty, nothing loaded");
      return { status: "empty", file: sourceFile, durationMs };
    }

    log.ingest.info({ file: sourceFile, rows, durationMs }, "imported");
    return { status: "imported", file: sourceFile, rows, durationMs };
  } catch (err) {
    const error = describeError(err);
    log.ingest.error({ file: sourceFile, path: filePath, err: error }, "failed");
    return { status: "failed", file: sourceFile, error };
  }
}
