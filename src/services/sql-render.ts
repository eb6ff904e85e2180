/**
 * sql-render.ts — SQL text for projections and literals
 *
 * Literal rendering is chosen from each field's declared semantic type,
 * never from the runtime type of a value.
 */

import { SQL_TYPES, type FieldDescriptor } from "../schema/trip-schema.js";
import type { ProjectionItem } from "./field-mapping.js";

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function renderNumber(value: number, keepDecimal: boolean): string {
  if (!Number.isFinite(value)) return "NULL";
  const text = String(value);
  return keepDecimal && Number.isInteger(value) ? `${text}.0` : text;
}

/** SQL literal for a field's default value. Empty or absent strings become NULL. */
export function renderDefault(field: FieldDescriptor): string {
  switch (field.semanticType) {
    case "integer":
      return renderNumber(Math.trunc(field.defaultValue), false);
    case "float":
      return renderNumber(field.defaultValue, true);
    case "boolean":
      return field.defaultValue ? "TRUE" : "FALSE";
    case "string":
      return field.defaultValue === null || field.defaultValue === ""
        ? "NULL"
        : quoteLiteral(field.defaultValue);
  }
}

export function renderProjection(item: ProjectionItem): string {
  switch (item.kind) {
    case "column": {
      const source = quoteIdentifier(item.sourceColumn);
      const sqlType = SQL_TYPES[item.field.semanticType].ddl;
      return `COALESCE(CAST(${source} AS ${sqlType}), ${renderDefault(item.field)}) AS ${quoteIdentifier(item.field.name)}`;
    }
    case "default":
      return `${renderDefault(item.field)} AS ${quoteIdentifier(item.field.name)}`;
    case "provenance":
      return `${quoteLiteral(item.value)} AS ${quoteIdentifier(item.name)}`;
  }
}

/** Target column list for an INSERT, matching the projection order. */
export function projectionColumns(items: readonly ProjectionItem[]): string[] {
  return items.map((item) => (item.kind === "provenance" ? item.name : item.field.name));
}
