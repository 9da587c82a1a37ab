import type { FastifyInstance } from "fastify";
import {
  bedInputSchema,
  bedListQuerySchema,
  bedPatchSchema,
  canteenInputSchema,
  canteenListQuerySchema,
  canteenPatchSchema,
  doctorInputSchema,
  doctorListQuerySchema,
  doctorPatchSchema,
  medicalLabInputSchema,
  medicalLabListQuerySchema,
  medicalLabPatchSchema,
  patientInputSchema,
  patientListQuerySchema,
  patientPatchSchema,
} from "../models/hospital.js";
import type { RouteOptions } from "./catalog.js";
import { registerCrudRoutes, type IdParams } from "./crud.js";

/** Doctors, beds, canteens, medical labs, patients and their associations. */
export async function registerHospitalRoutes(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { doctors, beds, canteens, medicalLabs, patients } = opts.services;

  registerCrudRoutes(app, {
    path: "/api/doctors",
    service: doctors,
    inputSchema: doctorInputSchema,
    patchSchema: doctorPatchSchema,
    listQuerySchema: doctorListQuerySchema,
  });

  registerCrudRoutes(app, {
    path: "/api/beds",
    service: beds,
    inputSchema: bedInputSchema,
    patchSchema: bedPatchSchema,
    listQuerySchema: bedListQuerySchema,
    filters: (query) => ({ where: query.ward ? { ward: query.ward } : undefined }),
  });

  registerCrudRoutes(app, {
    path: "/api/canteens",
    service: canteens,
    inputSchema: canteenInputSchema,
    patchSchema: canteenPatchSchema,
    listQuerySchema: canteenListQuerySchema,
  });

  registerCrudRoutes(app, {
    path: "/api/medical-labs",
    service: medicalLabs,
    inputSchema: medicalLabInputSchema,
    patchSchema: medicalLabPatchSchema,
    listQuerySchema: medicalLabListQuerySchema,
  });

  registerCrudRoutes(app, {
    path: "/api/patients",
    service: patients,
    inputSchema: patientInputSchema,
    patchSchema: patientPatchSchema,
    listQuerySchema: patientListQuerySchema,
    filters: (query) => ({
      where: {
        ...(query.doctorId ? { doctorId: query.doctorId } : {}),
        ...(query.canteenId ? { canteenId: query.canteenId } : {}),
      },
    }),
  });

  // ── Association lookups ─────────────────────────────────────────────

  app.get<{ Params: IdParams }>("/api/doctors/:id/patients", async (request, reply) => {
    return reply.send(await doctors.patientsOf(request.params.id));
  });

  app.get<{ Params: IdParams }>("/api/canteens/:id/patients", async (request, reply) => {
    return reply.send(await canteens.patientsOf(request.params.id));
  });

  app.get<{ Params: IdParams }>("/api/medical-labs/:id/patients", async (request, reply) => {
    return reply.send(await medicalLabs.patientsOf(request.params.id));
  });

  // ── Lab assignment (many-to-many) ───────────────────────────────────

  app.put<{ Params: IdParams & { labId: string } }>("/api/patients/:id/labs/:labId", async (request, reply) => {
    return reply.send(await patients.assignLab(request.params.id, request.params.labId));
  });

  app.delete<{ Params: IdParams & { labId: string } }>("/api/patients/:id/labs/:labId", async (request, reply) => {
    return reply.send(await patients.removeLab(request.params.id, request.params.labId));
  });
}
