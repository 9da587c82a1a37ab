import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseAppConfig, type LoadedAppConfig } from "../config/app-config.js";
import { openDatabase } from "../db/connection.js";
import { APPLICATION_TABLES, findMissingTables } from "../db/schema.js";
import { createRepositories, openDatasource } from "../server.js";

function loaded(raw: Record<string, unknown>, baseDir = "/tmp"): LoadedAppConfig {
  return { config: parseAppConfig(raw), baseDir, path: null };
}

describe("openDatasource", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("uses in-memory repositories for memory: and skips the schema", async () => {
    const ds = openDatasource(loaded({ datasource: { url: "memory:", username: "clinic", password: "test-secret" } }));

    expect(ds.info).toEqual({ kind: "memory", url: "memory:", username: "clinic" });
    expect(ds.schema).toBeNull();
    await ds.repositories.products.create({ name: "Lamp", price: 10 });
    expect(await ds.repositories.products.count()).toBe(1);
    ds.close();
  });

  it("migrates an in-memory SQLite database under update", async () => {
    const ds = openDatasource(loaded({ datasource: { url: "sqlite::memory:" } }));
    try {
      expect(ds.info.kind).toBe("sqlite");
      expect(ds.schema).toEqual({ mode: "update", applied: [1, 2], dropped: false, dropOnClose: false });
      expect(await ds.repositories.patients.count()).toBe(0);
    } finally {
      ds.close();
    }
  });

  it("fails validate against an empty database", () => {
    expect(() => openDatasource(loaded({ datasource: { url: "sqlite::memory:" }, schema: { mode: "validate" } }))).toThrow(
      "Schema validation failed, missing tables: ",
    );
  });

  it("lets the caller override the configured mode", () => {
    const ds = openDatasource(loaded({ datasource: { url: "sqlite::memory:" }, schema: { mode: "none" } }), "create");
    try {
      expect(ds.schema).toMatchObject({ mode: "create", dropped: true });
    } finally {
      ds.close();
    }
  });

  it("drops the schema on close under create-drop", () => {
    dir = mkdtempSync(join(tmpdir(), "tierwise-server-"));
    const ds = openDatasource(
      loaded({ datasource: { url: "sqlite:data/app.db" }, schema: { mode: "create-drop" } }, dir),
    );
    expect(ds.schema?.dropOnClose).toBe(true);
    ds.close();

    const db = openDatabase(join(dir, "data", "app.db"));
    try {
      expect(findMissingTables(db)).toEqual([...APPLICATION_TABLES]);
    } finally {
      db.close();
    }
  });

  it("keeps the schema on close under create", () => {
    dir = mkdtempSync(join(tmpdir(), "tierwise-server-"));
    openDatasource(loaded({ datasource: { url: "sqlite:app.db" }, schema: { mode: "create" } }, dir)).close();

    const db = openDatabase(join(dir, "app.db"));
    try {
      expect(findMissingTables(db)).toEqual([]);
    } finally {
      db.close();
    }
  });
});

describe("createRepositories", () => {
  it("falls back to in-memory repositories without a database", async () => {
    const repos = createRepositories(null);
    const ada = await repos.users.create({ name: "Ada", email: "ada@example.com" });
    expect(await repos.users.findById(ada.id)).toEqual(ada);
  });
});
