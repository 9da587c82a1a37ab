import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";

import type { AppConfig } from "./config/app-config.js";
import { errorHandling } from "./errors/error-handler.js";
import { registerCatalogRoutes } from "./routes/catalog.js";
import { registerHospitalRoutes } from "./routes/hospital.js";
import { registerMiscRoutes, type DatasourceInfo } from "./routes/misc.js";
import type { Services } from "./services/index.js";

export const VERSION = "0.1.0";

export interface AppOptions {
  config: AppConfig;
  services: Services;
  datasource: DatasourceInfo;
}

/**
 * Builds the Fastify instance without listening, so tests can drive it
 * through `app.inject`.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { config, services, datasource } = options;

  const app = Fastify({ logger: { level: config.logging.level } });

  await app.register(cors, { origin: config.server.corsOrigin });
  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  });
  await app.register(errorHandling);

  // ── Feature routes ────────────────────────────────────────────────────
  await app.register(registerMiscRoutes, { services, datasource, version: VERSION });
  await app.register(registerCatalogRoutes, { services });
  await app.register(registerHospitalRoutes, { services });

  return app;
}
