import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { APPLICATION_TABLES, findMissingTables } from "../../db/schema.js";
import { applySchemaMode } from "../../db/schema-mode.js";
import { getCurrentVersion } from "../../db/migrations.js";
import { SchemaValidationError } from "../../errors/app-error.js";
import { SqliteProductRepository } from "../../repositories/products.js";

describe("applySchemaMode", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
    db.pragma("foreign_keys = ON");
  });

  afterEach(() => {
    db.close();
  });

  it("none leaves the database untouched", () => {
    expect(applySchemaMode(db, "none")).toEqual({ mode: "none", applied: [], dropped: false, dropOnClose: false });
    expect(findMissingTables(db)).toEqual([...APPLICATION_TABLES]);
  });

  it("validate lists every missing table", () => {
    expect(() => applySchemaMode(db, "validate")).toThrow(SchemaValidationError);
    try {
      applySchemaMode(db, "validate");
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaValidationError);
      if (err instanceof SchemaValidationError) {
        expect(err.missing).toEqual([...APPLICATION_TABLES]);
        expect(err.code).toBe("SCHEMA_INVALID");
        expect(err.isOperational).toBe(false);
      }
    }
  });

  it("validate passes once the schema exists", () => {
    applySchemaMode(db, "update");
    expect(applySchemaMode(db, "validate")).toEqual({
      mode: "validate",
      applied: [],
      dropped: false,
      dropOnClose: false,
    });
  });

  it("update migrates once and keeps data", async () => {
    expect(applySchemaMode(db, "update").applied).toEqual([1, 2]);
    const products = new SqliteProductRepository(db);
    await products.create({ name: "Lamp", price: 10 });

    expect(applySchemaMode(db, "update").applied).toEqual([]);
    expect(await products.count()).toBe(1);
  });

  it("create drops existing data and migrates from scratch", async () => {
    applySchemaMode(db, "update");
    const products = new SqliteProductRepository(db);
    await products.create({ name: "Lamp", price: 10 });

    const result = applySchemaMode(db, "create");
    expect(result).toEqual({ mode: "create", applied: [1, 2], dropped: true, dropOnClose: false });
    expect(await products.count()).toBe(0);
    expect(getCurrentVersion(db)).toBe(2);
  });

  it("create-drop asks for the schema to be dropped on close", () => {
    expect(applySchemaMode(db, "create-drop")).toEqual({
      mode: "create-drop",
      applied: [1, 2],
      dropped: true,
      dropOnClose: true,
    });
  });
});
