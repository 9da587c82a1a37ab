import { describe, it, expect, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { DatabaseError } from "../../errors/app-error.js";
import { buildTestApp, type TestApp } from "../helpers/app.js";

describe("service routes and error handling", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    await app?.close();
    app = undefined;
  });

  async function start(overrides: Record<string, unknown> = {}): Promise<TestApp> {
    const built = await buildTestApp(undefined, overrides);
    app = built.app;
    return built;
  }

  it("GET /api/health reports the datasource and record counts", async () => {
    const built = await start();
    await built.services.products.create({ name: "Lamp", price: 10 });

    const res = await built.app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "ok",
      datasource: { kind: "memory", url: "memory:", username: "" },
      counts: {
        products: 1,
        students: 0,
        users: 0,
        doctors: 0,
        beds: 0,
        canteens: 0,
        medicalLabs: 0,
        patients: 0,
      },
    });
  });

  it("GET /api lists the resource paths", async () => {
    const { app } = await start();

    const res = await app.inject({ method: "GET", url: "/api" });

    expect(res.json()).toEqual({
      service: "tierwise",
      version: "0.1.0",
      resources: {
        products: "/api/products",
        students: "/api/students",
        users: "/api/users",
        doctors: "/api/doctors",
        beds: "/api/beds",
        canteens: "/api/canteens",
        medicalLabs: "/api/medical-labs",
        patients: "/api/patients",
      },
      health: "/api/health",
    });
  });

  it("answers 404 ROUTE_NOT_FOUND for unknown routes", async () => {
    const { app } = await start();

    const res = await app.inject({ method: "GET", url: "/api/nope?x=1" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Route GET /api/nope not found", code: "ROUTE_NOT_FOUND" });
  });

  it("keeps the 400 status of malformed JSON", async () => {
    const { app } = await start();

    const res = await app.inject({
      method: "POST",
      url: "/api/products",
      headers: { "content-type": "application/json" },
      payload: "{ not json",
    });

    expect(res.statusCode).toBe(400);
  });

  it("answers application errors with their own status", async () => {
    const built = await start();
    vi.spyOn(built.services.products, "count").mockRejectedValue(new DatabaseError("database is locked"));

    const res = await built.app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "database is locked", code: "DATABASE_ERROR" });
  });

  it("hides the message of unexpected errors", async () => {
    const built = await start();
    vi.spyOn(built.services.products, "count").mockRejectedValue(new Error("secret internals"));

    const res = await built.app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Internal Server Error", code: "INTERNAL_ERROR" });
  });

  it("rate limits once the configured budget is spent", async () => {
    const { app } = await start({ rateLimit: { max: 2, timeWindow: "1 minute" } });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await app.inject({ method: "GET", url: "/api" })).statusCode);
    }

    expect(statuses).toEqual([200, 200, 429]);
  });
});
