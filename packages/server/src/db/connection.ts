import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";

export type { DatabaseType };

export const IN_MEMORY = ":memory:";

export type DatasourceTarget =
  | { kind: "sqlite"; filename: string }
  | { kind: "memory" };

/**
 * Resolves a datasource URL:
 * - `sqlite:<path>`: file relative to `baseDir`
 * - `sqlite::memory:`: private in-memory SQLite database
 * - `memory:`: plain in-memory repositories, no SQL at all
 */
export function resolveDatasource(url: string, baseDir: string): DatasourceTarget {
  if (url === "memory:") return { kind: "memory" };
  if (url.startsWith("sqlite:")) {
    const location = url.slice("sqlite:".length);
    if (location === IN_MEMORY) return { kind: "sqlite", filename: IN_MEMORY };
    if (location.length > 0) return { kind: "sqlite", filename: resolve(baseDir, location) };
  }
  throw new Error(`Unsupported datasource url '${url}' (expected sqlite:<path>, sqlite::memory: or memory:)`);
}

/**
 * Opens a SQLite database with foreign keys enforced. File databases get
 * their parent directory created and run in WAL mode.
 */
export function openDatabase(filename: string): DatabaseType {
  if (filename !== IN_MEMORY) mkdirSync(dirname(filename), { recursive: true });

  try {
    const db = new Database(filename);
    if (filename !== IN_MEMORY) db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    return db;
  } catch (err) {
    throw new Error(
      `Failed to open database "${filename}": ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
