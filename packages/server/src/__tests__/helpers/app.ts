import type { FastifyInstance } from "fastify";
import { buildApp } from "../../app.js";
import { parseAppConfig, type AppConfig } from "../../config/app-config.js";
import { createInMemoryRepositories, type Repositories } from "../../repositories/index.js";
import { createServices, type Services } from "../../services/index.js";

export interface TestApp {
  app: FastifyInstance;
  services: Services;
}

/** App over in-memory repositories (or the given ones) with logging silenced. */
export async function buildTestApp(
  repositories: Repositories = createInMemoryRepositories(),
  overrides: Record<string, unknown> = {},
): Promise<TestApp> {
  const config: AppConfig = parseAppConfig({ logging: { level: "silent" }, ...overrides });
  const services = createServices(repositories);
  const app = await buildApp({
    config,
    services,
    datasource: { kind: "memory", url: "memory:", username: "" },
  });
  await app.ready();
  return { app, services };
}
