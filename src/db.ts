/**
 * db.ts — DuckDB connection layer
 *
 * One embedded database file, one connection, owned by a single run.
 *
 * Pattern:
 *   await withDatabase(databasePath, async (conn) => {
 *     await ensureTripTable(conn, tableName);
 *     ...
 *   });
 *   // instance and connection are closed on every exit path
 *
 * DuckDB holds an exclusive lock on a database file opened read-write, so a
 * second ingestion process against the same file fails at open time instead
 * of racing the ledger check.
 */

import { DuckDBInstance, type DuckDBConnection, type DuckDBResultReader } from "@duckdb/node-api";
import { log } from "./logger.js";

export type Connection = DuckDBConnection;
export type Row = ReturnType<DuckDBResultReader["getRowObjectsJS"]>[number];
export type QueryParams = Parameters<DuckDBConnection["run"]>[1];

export const IN_MEMORY = ":memory:";

export interface Database {
  connection: Connection;
  path: string;
  close(): void;
}

/**
 * Open (creating if absent) a database file and connect to it.
 *
 * @param databasePath — file path, or ":memory:" for a throwaway database
 */
export async function openDatabase(databasePath: string = IN_MEMORY): Promise<Database> {
  const instance = await DuckDBInstance.create(databasePath);
  let connection: Connection;
  try {
    connection = await instance.connect();
  } catch (err) {
    instance.closeSync();
    throw err;
  }

  let closed = false;
  return {
    connection,
    path: databasePath,
    close() {
      if (closed) return;
      closed = true;
      connection.closeSync();
      instance.closeSync();
      log.db.debug({ path: databasePath }, "database closed");
    },
  };
}

/**
 * Run a callback against a freshly opened database and release it afterwards,
 * whether the callback resolves or throws.
 */
export async function withDatabase<T>(
  databasePath: string,
  fn: (connection: Connection) => Promise<T>,
): Promise<T> {
  const db = await openDatabase(databasePath);
  log.db.debug({ path: databasePath }, "database opened");
  try {
    return await fn(db.connection);
  } finally {
    db.close();
  }
}

/**
 * Execute a callback inside a transaction.
 * Commits on success, rolls back on error.
 */
export async function withTransaction<T>(
  connection: Connection,
  fn: (connection: Connection) => Promise<T>,
): Promise<T> {
  await connection.run("BEGIN TRANSACTION");
  try {
    const result = await fn(connection);
    await connection.run("COMMIT");
    return result;
  } catch (e) {
    try {
      await connection.run("ROLLBACK");
    } catch (rollbackErr) {
      log.db.warn({ err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) }, "rollback failed");
    }
    throw e;
  }
}

/** Run a query and return its rows as plain JS objects. */
export async function queryRows(connection: Connection, sql: string, params?: QueryParams): Promise<Row[]> {
  const reader = await connection.runAndReadAll(sql, params);
  return reader.getRowObjectsJS();
}

/** Coerce a numeric cell (DuckDB BIGINT arrives as bigint) to a JS number. */
export function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string") return Number(value);
  return 0;
}
