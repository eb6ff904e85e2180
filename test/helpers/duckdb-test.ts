/**
 * duckdb-test.ts — DuckDB test helper for Vitest.
 *
 * Tests run against in-process DuckDB: an in-memory database for store-level
 * suites, a database file in a temp directory for run-level suites. Parquet
 * fixtures are written by DuckDB itself with COPY ... TO.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { IN_MEMORY, openDatabase, queryRows, type Connection, type Database, type Row } from "../../src/db.js";
import { quoteIdentifier, quoteLiteral } from "../../src/services/sql-render.js";

export type { Connection, Database, Row };

/** Open a throwaway in-memory database. */
export function openTestDatabase(): Promise<Database> {
  return openDatabase(IN_MEMORY);
}

/** Temp directories created during a suite; remove them with `cleanup()` in afterEach. */
export function createTempDirs(prefix = "trip-ingest-") {
  const dirs: string[] = [];
  return {
    async make(): Promise<string> {
      const dir = await mkdtemp(join(tmpdir(), prefix));
      dirs.push(dir);
      return dir;
    },
    async cleanup(): Promise<void> {
      for (const dir of dirs) {
        await rm(dir, { recursive: true, force: true });
      }
      dirs.length = 0;
    },
  };
}

/** Write the result of `selectSql` to a Parquet file. */
export async function writeParquet(connection: Connection, filePath: string, selectSql: string): Promise<void> {
  await connection.run(`COPY (${selectSql}) TO ${quoteLiteral(filePath)} (FORMAT PARQUET)`);
}

/** Write a Parquet fixture using a short-lived in-memory database. */
export async function writeParquetFixture(filePath: string, selectSql: string): Promise<void> {
  const db = await openTestDatabase();
  try {
    await writeParquet(db.connection, filePath, selectSql);
  } finally {
    db.close();
  }
}

/** Selected columns of a table's rows, ordered by `orderBy`. */
export async function selectColumns(
  connection: Connection,
  tableName: string,
  columns: string[],
  orderBy: string,
  where?: { column: string; equals: string },
): Promise<Row[]> {
  const filter = where ? ` WHERE ${quoteIdentifier(where.column)} = $1` : "";
  return queryRows(
    connection,
    `SELECT ${columns.map(quoteIdentifier).join(", ")} FROM ${quoteIdentifier(tableName)}${filter} ORDER BY ${quoteIdentifier(orderBy)}`,
    where ? [where.equals] : undefined,
  );
}
