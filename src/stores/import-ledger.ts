/**
 * import-ledger.ts — Which source files are already in the trip table
 *
 * There is no separate ledger: a file counts as imported when at least one
 * row carries its name in `source_file`. Each file's rows land inside one
 * transaction (see trip-ingest.ts), so presence means complete.
 *
 * The check-then-insert is only sound with a single writer per database.
 */

import { queryRows, toNumber, type Connection } from "../db.js";
import { LedgerCheckError } from "../errors.js";
import { log } from "../logger.js";
import { SOURCE_FILE_COLUMN } from "../schema/trip-schema.js";
import { quoteIdentifier } from "../services/sql-render.js";

export interface ImportedFile {
  sourceFile: string;
  rows: number;
}

/** Rows currently stored for one source file. */
export async function countRows(connection: Connection, tableName: string, sourceFile: string): Promise<number> {
  const rows = await queryRows(
    connection,
    `SELECT COUNT(*) AS row_count FROM ${quoteIdentifier(tableName)} WHERE ${quoteIdentifier(SOURCE_FILE_COLUMN)} = $1`,
    [sourceFile],
  );
  return toNumber(rows[0]?.row_count);
}

/**
 * Whether any row already carries this provenance. A failing query is never
 * read as "not imported": it raises LedgerCheckError.
 */
export async function isImported(connection: Connection, tableName: string, sourceFile: string): Promise<boolean> {
  let count: number;
  try {
    count = await countRows(connection, tableName, sourceFile);
  } catch (err) {
    throw new LedgerCheckError(sourceFile, { cause: err });
  }
  log.ledger.debug({ file: sourceFile, rows: count }, "ledger check");
  return count > 0;
}

/** Every imported file with its row count, ordered by name. */
export async function listImported(connection: Connection, tableName: string): Promise<ImportedFile[]> {
  const column = quoteIdentifier(SOURCE_FILE_COLUMN);
  const rows = await queryRows(
    connection,
    `SELECT ${column} AS source_file, COUNT(*) AS row_count
       FROM ${quoteIdentifier(tableName)}
      GROUP BY ${column}
      ORDER BY ${column}`,
  );
  return rows.map((row) => ({ sourceFile: String(row.source_file), rows: toNumber(row.row_count) }));
}
