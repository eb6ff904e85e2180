/**
 * db.test.ts — DuckDB connection layer
 */

import { join } from "node:path";
import { describe, it, expect, afterEach } from "vitest";
import { openDatabase, queryRows, toNumber, withDatabase, withTransaction } from "../src/db.js";
import { createTempDirs, openTestDatabase } from "./helpers/duckdb-test.js";

const tempDirs = createTempDirs("trip-ingest-db-");

afterEach(async () => {
  await tempDirs.cleanup();
});

describe("withTransaction", () => {
  it("commits when the callback resolves", async () => {
    const db = await openTestDatabase();
    try {
      await db.connection.run("CREATE TABLE t (x INT)");
      const result = await withTransaction(db.connection, async (tx) => {
        await tx.run("INSERT INTO t VALUES (1), (2)");
        return "done";
      });
      expect(result).toBe("done");
      expect(await queryRows(db.connection, "SELECT x FROM t ORDER BY x")).toEqual([{ x: 1 }, { x: 2 }]);
    } finally {
      db.close();
    }
  });

  it("rolls back and rethrows when the callback throws", async () => {
    const db = await openTestDatabase();
    try {
      await db.connection.run("CREATE TABLE t (x INT)");
      await expect(
        withTransaction(db.connection, async (tx) => {
          await tx.run("INSERT INTO t VALUES (1)");
          throw new Error("halt");
        }),
      ).rejects.toThrow("halt");
      expect(await queryRows(db.connection, "SELECT x FROM t")).toEqual([]);
    } finally {
      db.close();
    }
  });
});

describe("withDatabase", () => {
  it("persists to the file and releases it after the callback", async () => {
    const dir = await tempDirs.make();
    const dbPath = join(dir, "state.duckdb");

    await withDatabase(dbPath, async (connection) => {
      await connection.run("CREATE TABLE t (x INT)");
      await connection.run("INSERT INTO t VALUES (42)");
    });

    const rows = await withDatabase(dbPath, (connection) => queryRows(connection, "SELECT x FROM t"));
    expect(rows).toEqual([{ x: 42 }]);
  });

  it("releases the file when the callback throws", async () => {
    const dir = await tempDirs.make();
    const dbPath = join(dir, "state.duckdb");

    await expect(
      withDatabase(dbPath, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    const db = await openDatabase(dbPath);
    db.close();
    db.close();
    expect(db.path).toBe(dbPath);
  });
});

describe("toNumber", () => {
  it("coerces DuckDB numeric cells", () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber(BigInt(12))).toBe(12);
    expect(toNumber("7")).toBe(7);
    expect(toNumber(null)).toBe(0);
    expect(toNumber(undefined)).toBe(0);
  });
});
