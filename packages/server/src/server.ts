import type { FastifyInstance } from "fastify";

import { buildApp } from "./app.js";
import type { LoadedAppConfig, SchemaMode } from "./config/app-config.js";
import { openDatabase, resolveDatasource, type DatabaseType } from "./db/connection.js";
import { dropSchema } from "./db/schema.js";
import { applySchemaMode, type SchemaModeResult } from "./db/schema-mode.js";
import { createInMemoryRepositories, createSqliteRepositories, type Repositories } from "./repositories/index.js";
import type { DatasourceInfo } from "./routes/misc.js";
import { createServices } from "./services/index.js";

export interface Datasource {
  info: DatasourceInfo;
  repositories: Repositories;
  /** Outcome of the schema-generation mode; null for `memory:`. */
  schema: SchemaModeResult | null;
  close(): void;
}

/** SQLite repositories over `db`, or the in-memory set when there is none. */
export function createRepositories(db: DatabaseType | null): Repositories {
  return db ? createSqliteRepositories(db) : createInMemoryRepositories();
}

/**
 * Opens the configured datasource and applies the schema-generation mode.
 * `mode` overrides the configured one (used by `tierwise schema <mode>`).
 */
export function openDatasource(loaded: LoadedAppConfig, mode?: SchemaMode): Datasource {
  const { url, username } = loaded.config.datasource;
  const target = resolveDatasource(url, loaded.baseDir);

  if (target.kind === "memory") {
    return {
      info: { kind: "memory", url, username },
      repositories: createRepositories(null),
      schema: null,
      close: () => {},
    };
  }

  const db = openDatabase(target.filename);
  let schema: SchemaModeResult;
  try {
    schema = applySchemaMode(db, mode ?? loaded.config.schema.mode);
  } catch (err) {
    db.close();
    throw err;
  }

  return {
    info: { kind: "sqlite", url, username },
    repositories: createRepositories(db),
    schema,
    close: () => {
      if (schema.dropOnClose) dropSchema(db);
      db.close();
    },
  };
}

/** Opens the datasource, builds the app and listens until SIGINT/SIGTERM. */
export async function startServer(loaded: LoadedAppConfig): Promise<FastifyInstance> {
  const { config } = loaded;
  const datasource = openDatasource(loaded);

  const app = await buildApp({
    config,
    services: createServices(datasource.repositories),
    datasource: datasource.info,
  });

  if (loaded.path) app.log.info({ path: loaded.path }, "configuration loaded");
  if (datasource.schema) {
    app.log.info(
      { mode: datasource.schema.mode, applied: datasource.schema.applied, dropped: datasource.schema.dropped },
      "schema ready",
    );
  } else {
    app.log.info({ mode: config.schema.mode }, "memory datasource, schema mode ignored");
  }

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    datasource.close();
    throw err;
  }

  // ── Graceful shutdown ─────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, "shutting down");
    await app.close();
    datasource.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error(err, "shutdown failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return app;
}
