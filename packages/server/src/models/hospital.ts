import { z } from "zod";
import { META_SORT_FIELDS, nameField, pageQuerySchema, patchOf, type Entity } from "./common.js";

/*
 * Hospital sketch: a patient is treated by one doctor (many-to-one), occupies
 * at most one bed (one-to-one), eats at one canteen (many-to-one) and is sent
 * to any number of medical labs (many-to-many).
 */

export interface Doctor extends Entity {
  name: string;
  specialization: string;
}

export interface Bed extends Entity {
  ward: string;
  number: number;
}

export interface Canteen extends Entity {
  name: string;
  location: string | null;
}

export interface MedicalLab extends Entity {
  name: string;
  labType: string;
}

export interface Patient extends Entity {
  name: string;
  age: number;
  doctorId: string | null;
  bedId: string | null;
  canteenId: string | null;
  labIds: string[];
}

/* ------------------------------------------------------------------ */
/*  Input schemas                                                      */
/* ------------------------------------------------------------------ */

export const doctorInputSchema = z.object({
  name: nameField,
  specialization: nameField,
});

export const bedInputSchema = z.object({
  ward: z.string().trim().min(1).max(100),
  number: z.number().int().min(1),
});

export const canteenInputSchema = z.object({
  name: nameField,
  location: z.string().trim().max(200).nullable().optional(),
});

export const medicalLabInputSchema = z.object({
  name: nameField,
  labType: nameField,
});

const reference = z.string().trim().min(1).nullable().optional();

export const patientInputSchema = z.object({
  name: nameField,
  age: z.number().int().min(0).max(150),
  doctorId: reference,
  bedId: reference,
  canteenId: reference,
  labIds: z.array(z.string().trim().min(1)).optional(),
});

export const doctorPatchSchema = patchOf(doctorInputSchema);
export const bedPatchSchema = patchOf(bedInputSchema);
export const canteenPatchSchema = patchOf(canteenInputSchema);
export const medicalLabPatchSchema = patchOf(medicalLabInputSchema);
export const patientPatchSchema = patchOf(patientInputSchema);

export type DoctorInput = z.infer<typeof doctorInputSchema>;
export type DoctorPatch = z.infer<typeof doctorPatchSchema>;
export type BedInput = z.infer<typeof bedInputSchema>;
export type BedPatch = z.infer<typeof bedPatchSchema>;
export type CanteenInput = z.infer<typeof canteenInputSchema>;
export type CanteenPatch = z.infer<typeof canteenPatchSchema>;
export type MedicalLabInput = z.infer<typeof medicalLabInputSchema>;
export type MedicalLabPatch = z.infer<typeof medicalLabPatchSchema>;
export type PatientInput = z.infer<typeof patientInputSchema>;
export type PatientPatch = z.infer<typeof patientPatchSchema>;

/* ------------------------------------------------------------------ */
/*  List queries                                                       */
/* ------------------------------------------------------------------ */

export const doctorListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "specialization", ...META_SORT_FIELDS]).optional(),
});

export const bedListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["ward", "number", ...META_SORT_FIELDS]).optional(),
  ward: z.string().trim().min(1).optional(),
});

export const canteenListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "location", ...META_SORT_FIELDS]).optional(),
});

export const medicalLabListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "labType", ...META_SORT_FIELDS]).optional(),
});

export const patientListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "age", "doctorId", "bedId", "canteenId", ...META_SORT_FIELDS]).optional(),
  doctorId: z.string().trim().min(1).optional(),
  canteenId: z.string().trim().min(1).optional(),
});
