/**
 * Tests for the SQLite key-value state store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Database } from "../db/sqlite.js";
import { SqliteStateStore, stateValueType } from "../db/state.js";
import { cleanupDb, createTempDbPath } from "./helpers.js";

describe("SqliteStateStore", () => {
  let dbPath: string;
  let db: Database;
  let store: SqliteStateStore;

  beforeEach(() => {
    dbPath = createTempDbPath();
    db = new Database(dbPath);
    store = new SqliteStateStore(db);
  });

  afterEach(() => {
    cleanupDb(db, dbPath);
  });

  it("should round-trip JSON values", async () => {
    await store.set("mood", "calm");
    await store.set("count", 3);
    await store.set("flags", { garden: true, visits: [1, 2] });

    expect(await store.get("mood")).toBe("calm");
    expect(await store.get("count")).toBe(3);
    expect(await store.get("flags")).toEqual({ garden: true, visits: [1, 2] });
  });

  it("should return the default for missing keys", async () => {
    expect(await store.get("missing")).toBeUndefined();
    expect(await store.get("missing", 0)).toBe(0);
  });

  it("should overwrite existing keys and record the value type", async () => {
    await store.set("value", 1);
    await store.set("value", [1]);

    expect(await store.get("value")).toEqual([1]);
    const row = db
      .getDb()
      .prepare<[string], { value_type: string }>("SELECT value_type FROM core_state WHERE key = ?")
      .get("value");
    expect(row?.value_type).toBe("array");
  });

  it("should delete keys", async () => {
    await store.set("a", 1);
    expect(await store.delete("a")).toBe(true);
    expect(await store.delete("a")).toBe(false);
    expect(await store.get("a")).toBeUndefined();
  });

  it("should list keys alphabetically and export everything", async () => {
    await store.set("b", 2);
    await store.set("a", null);

    expect(await store.keys()).toEqual(["a", "b"]);
    expect(await store.export()).toEqual({ a: null, b: 2 });
  });

  it("should import entries over existing ones", async () => {
    await store.set("a", 1);
    await store.import({ a: "one", c: false });

    expect(await store.export()).toEqual({ a: "one", c: false });
  });
});

describe("stateValueType", () => {
  it("should name JSON value types", () => {
    expect(stateValueType(null)).toBe("null");
    expect(stateValueType([])).toBe("array");
    expect(stateValueType({})).toBe("object");
    expect(stateValueType("x")).toBe("string");
    expect(stateValueType(1)).toBe("number");
    expect(stateValueType(true)).toBe("boolean");
  });
});
