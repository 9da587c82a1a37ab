import type { Database } from "better-sqlite3";
import type { SchemaMode } from "../config/app-config.js";
import { SchemaValidationError } from "../errors/app-error.js";
import { runMigrations } from "./migrations.js";
import { dropSchema, findMissingTables } from "./schema.js";

export interface SchemaModeResult {
  mode: SchemaMode;
  /** Migration versions applied by this run. */
  applied: number[];
  /** Whether existing tables were dropped first. */
  dropped: boolean;
  /** Whether the schema must be dropped again when the datasource closes. */
  dropOnClose: boolean;
}

/**
 * Applies the schema-generation mode at startup.
 *
 * | mode          | effect                                               |
 * |---------------|------------------------------------------------------|
 * | `none`        | nothing                                              |
 * | `validate`    | throws unless every application table exists         |
 * | `update`      | runs pending migrations                              |
 * | `create`      | drops everything, then migrates from scratch         |
 * | `create-drop` | as `create`; caller drops the schema again on close  |
 */
export function applySchemaMode(db: Database, mode: SchemaMode): SchemaModeResult {
  switch (mode) {
    case "none":
      return { mode, applied: [], dropped: false, dropOnClose: false };
    case "validate": {
      const missing = findMissingTables(db);
      if (missing.length > 0) throw new SchemaValidationError(missing);
      return { mode, applied: [], dropped: false, dropOnClose: false };
    }
    case "update":
      return { mode, applied: runMigrations(db), dropped: false, dropOnClose: false };
    case "create":
    case "create-drop":
      dropSchema(db);
      return { mode, applied: runMigrations(db), dropped: true, dropOnClose: mode === "create-drop" };
  }
}
