/**
 * trip-schema.test.ts — Canonical trip schema registry
 */

import { describe, it, expect } from "vitest";
import {
  SOURCE_FILE_COLUMN,
  SQL_TYPES,
  TAXI_TRIP_SCHEMA,
  findField,
  storedColumnNames,
} from "../src/schema/trip-schema.js";

describe("TAXI_TRIP_SCHEMA", () => {
  it("lists the nineteen canonical fields in table order", () => {
    expect(TAXI_TRIP_SCHEMA.map((f) => f.name)).toEqual([
      "vendor_id",
      "tpep_pickup_datetime",
      "tpep_dropoff_datetime",
      "passenger_count",
      "trip_distance",
      "ratecode_id",
      "store_and_fwd_flag",
      "pu_location_id",
      "do_location_id",
      "payment_type",
      "fare_amount",
      "extra",
      "mta_tax",
      "tip_amount",
      "tolls_amount",
      "improvement_surcharge",
      "total_amount",
      "congestion_surcharge",
      "airport_fee",
    ]);
  });

  it("uses lowercase snake_case canonical names", () => {
    for (const field of TAXI_TRIP_SCHEMA) {
      expect(field.name).toMatch(/^[a-z][a-z0-9_]*$/);
    }
  });

  it("keeps aliases disjoint from each other and from canonical names", () => {
    const names = new Set(TAXI_TRIP_SCHEMA.map((f) => f.name));
    const aliases = TAXI_TRIP_SCHEMA.flatMap((f) => [...f.aliases]);
    expect(new Set(aliases).size).toBe(aliases.length);
    for (const alias of aliases) {
      expect(names.has(alias)).toBe(false);
    }
  });

  it("registers the historical spellings", () => {
    expect(findField(TAXI_TRIP_SCHEMA, "vendor_id")?.aliases).toEqual(["VendorID"]);
    expect(findField(TAXI_TRIP_SCHEMA, "ratecode_id")?.aliases).toEqual(["RatecodeID"]);
    expect(findField(TAXI_TRIP_SCHEMA, "pu_location_id")?.aliases).toEqual(["PULocationID"]);
    expect(findField(TAXI_TRIP_SCHEMA, "do_location_id")?.aliases).toEqual(["DOLocationID"]);
    expect(findField(TAXI_TRIP_SCHEMA, "airport_fee")?.aliases).toEqual(["Airport_fee"]);
  });

  it("gives numeric fields zero defaults and string fields no default", () => {
    expect(findField(TAXI_TRIP_SCHEMA, "passenger_count")).toEqual({
      name: "passenger_count",
      semanticType: "integer",
      defaultValue: 0,
      aliases: [],
    });
    expect(findField(TAXI_TRIP_SCHEMA, "tip_amount")?.defaultValue).toBe(0);
    expect(findField(TAXI_TRIP_SCHEMA, "store_and_fwd_flag")?.defaultValue).toBeNull();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(TAXI_TRIP_SCHEMA)).toBe(true);
  });

  it("returns undefined for unknown names and aliases", () => {
    expect(findField(TAXI_TRIP_SCHEMA, "VendorID")).toBeUndefined();
    expect(findField(TAXI_TRIP_SCHEMA, "surge_multiplier")).toBeUndefined();
  });
});

describe("storedColumnNames", () => {
  it("appends the provenance column after the canonical fields", () => {
    const columns = storedColumnNames(TAXI_TRIP_SCHEMA);
    expect(columns).toHaveLength(20);
    expect(columns[0]).toBe("vendor_id");
    expect(columns[19]).toBe(SOURCE_FILE_COLUMN);
  });
});

describe("SQL_TYPES", () => {
  it("maps semantic types to DDL and catalog names", () => {
    expect(SQL_TYPES.integer).toEqual({ ddl: "INT", catalog: "INTEGER" });
    expect(SQL_TYPES.float).toEqual({ ddl: "DOUBLE", catalog: "DOUBLE" });
    expect(SQL_TYPES.string).toEqual({ ddl: "STRING", catalog: "VARCHAR" });
    expect(SQL_TYPES.boolean).toEqual({ ddl: "BOOLEAN", catalog: "BOOLEAN" });
  });
});
