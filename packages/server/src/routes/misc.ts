import type { FastifyInstance } from "fastify";
import type { Services } from "../services/index.js";

/** What health reports about the datasource; never the password. */
export interface DatasourceInfo {
  kind: "sqlite" | "memory";
  url: string;
  username: string;
}

export type MiscRouteOptions = { services: Services; datasource: DatasourceInfo; version: string };

export const RESOURCES: ReadonlyArray<readonly [keyof Services, string]> = [
  ["products", "/api/products"],
  ["students", "/api/students"],
  ["users", "/api/users"],
  ["doctors", "/api/doctors"],
  ["beds", "/api/beds"],
  ["canteens", "/api/canteens"],
  ["medicalLabs", "/api/medical-labs"],
  ["patients", "/api/patients"],
];

/** Health and service index. */
export async function registerMiscRoutes(app: FastifyInstance, opts: MiscRouteOptions): Promise<void> {
  const { services, datasource, version } = opts;

  app.get("/api/health", async (_request, reply) => {
    const counts: Record<string, number> = {};
    for (const [key] of RESOURCES) {
      counts[key] = await services[key].count();
    }
    return reply.send({ status: "ok", datasource, counts });
  });

  app.get("/api", async (_request, reply) => {
    return reply.send({
      service: "tierwise",
      version,
      resources: Object.fromEntries(RESOURCES),
      health: "/api/health",
    });
  });
}
