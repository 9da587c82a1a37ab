export { buildApp, VERSION, type AppOptions } from "./app.js";
export { createRepositories, openDatasource, startServer, type Datasource } from "./server.js";

export * from "./config/app-config.js";
export * from "./errors/app-error.js";
export { errorHandling, toErrorBody, type ErrorBody } from "./errors/error-handler.js";

export { openDatabase, resolveDatasource, type DatasourceTarget } from "./db/connection.js";
export { runMigrations, getCurrentVersion, LATEST_VERSION } from "./db/migrations.js";
export { applySchemaMode, type SchemaModeResult } from "./db/schema-mode.js";
export { dropSchema, findMissingTables, APPLICATION_TABLES } from "./db/schema.js";

export * from "./models/common.js";
export * from "./models/product.js";
export * from "./models/student.js";
export * from "./models/user.js";
export * from "./models/hospital.js";

export { createInMemoryRepositories, createSqliteRepositories, type Repositories } from "./repositories/index.js";
export type { CrudRepository, IdFactory } from "./repositories/repository.js";
export { InMemoryRepository } from "./repositories/memory-repository.js";
export { SqliteRepository } from "./repositories/sqlite-repository.js";

export { createServices, type Services } from "./services/index.js";
export { CrudService } from "./services/crud.js";
export * from "./services/catalog.js";
export * from "./services/hospital.js";
