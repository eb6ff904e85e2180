/**
 * trip-table.ts — Provisioning for the canonical trip table
 *
 * DDL is derived from the schema registry: one column per canonical field,
 * typed by its semantic type, then the `source_file` provenance column.
 * Provisioning is idempotent and never alters an existing table; a table
 * whose shape has drifted is reported, not migrated.
 */

import { queryRows, type Connection } from "../db.js";
import { SchemaMismatchError } from "../errors.js";
import { log } from "../logger.js";
import {
  SOURCE_FILE_COLUMN,
  SQL_TYPES,
  TAXI_TRIP_SCHEMA,
  type TripSchema,
} from "../schema/trip-schema.js";
import { quoteIdentifier } from "../services/sql-render.js";

export interface TableColumn {
  name: string;
  type: string;
}

export function buildCreateTableSql(tableName: string, schema: TripSchema = TAXI_TRIP_SCHEMA): string {
  const columns = schema.map((field) => `${quoteIdentifier(field.name)} ${SQL_TYPES[field.semanticType].ddl}`);
  columns.push(`${quoteIdentifier(SOURCE_FILE_COLUMN)} ${SQL_TYPES.string.ddl}`);
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(tableName)} (${columns.join(", ")})`;
}

/** Columns the table should have, as DuckDB reports them back. */
export function expectedColumns(schema: TripSchema = TAXI_TRIP_SCHEMA): TableColumn[] {
  return [
    ...schema.map((field) => ({ name: field.name, type: SQL_TYPES[field.semanticType].catalog })),
    { name: SOURCE_FILE_COLUMN, type: SQL_TYPES.string.catalog },
  ];
}

/**
 * Current columns of `tableName` in ordinal order (empty when the table is absent).
 * Only the table that unqualified statements resolve to is described; same-named
 * tables in other schemas or attached databases are ignored.
 */
export async function describeTripTable(connection: Connection, tableName: string): Promise<TableColumn[]> {
  const rows = await queryRows(
    connection,
    `SELECT column_name, data_type
       FROM information_schema.columns
      WHERE table_name = $1
        AND table_schema = current_schema()
        AND table_catalog = current_database()
      ORDER BY ordinal_position`,
    [tableName],
  );
  return rows.map((row) => ({ name: String(row.column_name), type: String(row.data_type) }));
}

const formatColumn = (column: TableColumn): string => `${column.name} ${column.type}`;

/**
 * Create the table if absent, then confirm the existing table has the
 * canonical shape. Safe to call on every run.
 */
export async function ensureTripTable(
  connection: Connection,
  tableName: string,
  schema: TripSchema = TAXI_TRIP_SCHEMA,
): Promise<void> {
  await connection.run(buildCreateTableSql(tableName, schema));

  const expected = expectedColumns(schema).map(formatColumn);
  const actual = (await describeTripTable(connection, tableName)).map(formatColumn);
  const matches = expected.length === actual.length && expected.every((column, index) => column === actual[index]);
  if (!matches) {
    throw new SchemaMismatchError(tableName, expected, actual);
  }

  log.db.debug({ table: tableName, columns: actual.length }, "trip table ready");
}
