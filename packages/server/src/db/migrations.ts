import type { Database } from "better-sqlite3";
import { createCatalogTables, createHospitalTables } from "./schema.js";

interface Migration {
  version: number;
  up: (db: Database) => void;
}

const migrations: Migration[] = [
  {
    // products, students, users
    version: 1,
    up: (db) => {
      createCatalogTables(db);
    },
  },
  {
    // hospital sketch: doctors, beds, canteens, medical labs, patients
    version: 2,
    up: (db) => {
      createHospitalTables(db);
    },
  },
];

export const LATEST_VERSION = Math.max(...migrations.map((m) => m.version));

/**
 * Returns the highest schema version that has been applied,
 * or 0 if the schema_version table does not yet exist.
 */
export function getCurrentVersion(db: Database): number {
  const tableExists = db
    .prepare("SELECT 1 FROM sqlite_master WHERE type='table' AND name='schema_version'")
    .get();

  if (!tableExists) return 0;

  const row = db
    .prepare("SELECT MAX(version) AS version FROM schema_version")
    .get() as { version: number | null } | undefined;

  return row?.version ?? 0;
}

/**
 * Runs all pending migrations in order, each inside its own transaction so
 * a failure rolls back without recording the version. Returns the versions
 * that were applied.
 */
export function runMigrations(db: Database): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version    INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const current = getCurrentVersion(db);
  const pending = migrations
    .filter((m) => m.version > current)
    .sort((a, b) => a.version - b.version);

  const record = db.prepare("INSERT INTO schema_version (version) VALUES (?)");
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version);
    })();
  }

  return pending.map((m) => m.version);
}
