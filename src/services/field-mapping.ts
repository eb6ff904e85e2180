/**
 * field-mapping.ts — Source column → canonical field resolution
 *
 * The mapping table is built once per run from the schema registry and then
 * applied to each file's discovered column list to produce a projection:
 * one item per canonical field (source column or default) plus provenance.
 */

import { ConfigurationError, ProjectionError } from "../errors.js";
import {
  SOURCE_FILE_COLUMN,
  TAXI_TRIP_SCHEMA,
  findField,
  type FieldDescriptor,
  type TripSchema,
} from "../schema/trip-schema.js";

// ─── Types ──────────────────────────────────────────────────

/** Any known source column name (canonical or alias) → canonical name. */
export type FieldMappingTable = ReadonlyMap<string, string>;

export type ProjectionItem =
  /** Take the source value, substituting the field default when null. */
  | { kind: "column"; field: FieldDescriptor; sourceColumn: string }
  /** Column absent from the file: always the field default. */
  | { kind: "default"; field: FieldDescriptor }
  /** Constant provenance tag. */
  | { kind: "provenance"; name: string; value: string };

// ─── Mapping ────────────────────────────────────────────────

/**
 * Build the name-resolution table. Every canonical name maps to itself and
 * every alias to its owning field; a name claimed twice is a configuration
 * error rather than a silent overwrite.
 */
export function buildFieldMapping(schema: TripSchema = TAXI_TRIP_SCHEMA): FieldMappingTable {
  const mapping = new Map<string, string>();

  const claim = (sourceName: string, canonical: string): void => {
    const owner = mapping.get(sourceName);
    if (owner !== undefined) {
      throw new ConfigurationError(
        `column name "${sourceName}" is claimed by both "${owner}" and "${canonical}"`,
      );
    }
    mapping.set(sourceName, canonical);
  };

  for (const field of schema) {
    claim(field.name, field.name);
  }
  for (const field of schema) {
    for (const alias of field.aliases) {
      claim(alias, field.name);
    }
  }

  return mapping;
}

// ─── Projection ─────────────────────────────────────────────

/**
 * Pick the source column for each canonical field present in the file.
 * A column named exactly like the canonical field wins over an alias;
 * otherwise the first alias in file order is used.
 */
function matchSourceColumns(
  sourceColumns: Iterable<string>,
  mapping: FieldMappingTable,
): Map<string, string> {
  const matched = new Map<string, string>();
  for (const column of sourceColumns) {
    const canonical = mapping.get(column);
    if (canonical === undefined) continue;
    const current = matched.get(canonical);
    if (current === undefined || (current !== canonical && column === canonical)) {
      matched.set(canonical, column);
    }
  }
  return matched;
}

export function resolveProjection(
  sourceColumns: Iterable<string>,
  mapping: FieldMappingTable,
  sourceFile: string,
  schema: TripSchema = TAXI_TRIP_SCHEMA,
): ProjectionItem[] {
  const matched = matchSourceColumns(sourceColumns, mapping);

  for (const canonical of matched.keys()) {
    if (!findField(schema, canonical)) {
      throw new ProjectionError(`mapping targets "${canonical}", which is not a canonical field`);
    }
  }

  const items: ProjectionItem[] = schema.map((field): ProjectionItem => {
    if (mapping.get(field.name) !== field.name) {
      throw new ProjectionError(`canonical field "${field.name}" is missing from the field mapping`);
    }
    const sourceColumn = matched.get(field.name);
    return sourceColumn === undefined
      ? { kind: "default", field }
      : { kind: "column", field, sourceColumn };
  });

  items.push({ kind: "provenance", name: SOURCE_FILE_COLUMN, value: sourceFile });
  return items;
}

/** Source columns the projection drops (no canonical field or alias). */
export function unmappedColumns(sourceColumns: Iterable<string>, mapping: FieldMappingTable): string[] {
  return [...sourceColumns].filter((column) => !mapping.has(column));
}
