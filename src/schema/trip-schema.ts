/**
 * trip-schema.ts — Canonical trip record schema
 *
 * Ordered field descriptors for the `raw_taxi_trips` table. Canonical names
 * are lowercase snake_case; aliases are the historical spellings found in
 * older source files (e.g. `VendorID`). Defaults fill fields that a source
 * file lacks or leaves null.
 *
 * Both the table DDL and the field mapping are derived from this list, so
 * names, types and defaults must stay stable across runs.
 */

// ─── Types ──────────────────────────────────────────────────

export type SemanticType = "integer" | "float" | "string" | "boolean";

/** Literal type each semantic type's default is written in. */
export interface DefaultValueBySemanticType {
  integer: number;
  float: number;
  string: string | null;
  boolean: boolean;
}

export type FieldDescriptor = {
  [T in SemanticType]: {
    readonly name: string;
    readonly semanticType: T;
    readonly defaultValue: DefaultValueBySemanticType[T];
    readonly aliases: readonly string[];
  };
}[SemanticType];

export type TripSchema = readonly FieldDescriptor[];

/** Provenance column appended after the canonical fields. */
export const SOURCE_FILE_COLUMN = "source_file";

// ─── SQL Types ──────────────────────────────────────────────

/**
 * `ddl` is what CREATE TABLE is written with; `catalog` is how DuckDB reports
 * the same type back through information_schema.
 */
export const SQL_TYPES: Record<SemanticType, { ddl: string; catalog: string }> = {
  integer: { ddl: "INT", catalog: "INTEGER" },
  float: { ddl: "DOUBLE", catalog: "DOUBLE" },
  string: { ddl: "STRING", catalog: "VARCHAR" },
  boolean: { ddl: "BOOLEAN", catalog: "BOOLEAN" },
};

// ─── Registry ───────────────────────────────────────────────

function intField(name: string, defaultValue = 0, aliases: string[] = []): FieldDescriptor {
  return { name, semanticType: "integer", defaultValue, aliases };
}

function floatField(name: string, defaultValue = 0, aliases: string[] = []): FieldDescriptor {
  return { name, semanticType: "float", defaultValue, aliases };
}

function textField(name: string, defaultValue: string | null = null, aliases: string[] = []): FieldDescriptor {
  return { name, semanticType: "string", defaultValue, aliases };
}

export const TAXI_TRIP_SCHEMA: TripSchema = Object.freeze([
  intField("vendor_id", 0, ["VendorID"]),
  textField("tpep_pickup_datetime"),
  textField("tpep_dropoff_datetime"),
  intField("passenger_count"),
  floatField("trip_distance"),
  intField("ratecode_id", 0, ["RatecodeID"]),
  textField("store_and_fwd_flag"),
  intField("pu_location_id", 0, ["PULocationID"]),
  intField("do_location_id", 0, ["DOLocationID"]),
  intField("payment_type"),
  floatField("fare_amount"),
  floatField("extra"),
  floatField("mta_tax"),
  floatField("tip_amount"),
  floatField("tolls_amount"),
  floatField("improvement_surcharge"),
  floatField("total_amount"),
  floatField("congestion_surcharge"),
  floatField("airport_fee", 0, ["Airport_fee"]),
]);

// ─── Lookup ─────────────────────────────────────────────────

export function findField(schema: TripSchema, name: string): FieldDescriptor | undefined {
  return schema.find((field) => field.name === name);
}

/** Canonical column names followed by the provenance column, in table order. */
export function storedColumnNames(schema: TripSchema): string[] {
  return [...schema.map((field) => field.name), SOURCE_FILE_COLUMN];
}
