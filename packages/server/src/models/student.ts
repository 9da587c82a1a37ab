import { z } from "zod";
import { META_SORT_FIELDS, nameField, pageQuerySchema, patchOf, type Entity } from "./common.js";

export interface Student extends Entity {
  name: string;
  course: string;
  email: string | null;
}

export const studentInputSchema = z.object({
  name: nameField,
  course: nameField,
  email: z.string().trim().toLowerCase().email().nullable().optional(),
});

export const studentPatchSchema = patchOf(studentInputSchema);

export type StudentInput = z.infer<typeof studentInputSchema>;
export type StudentPatch = z.infer<typeof studentPatchSchema>;

export const studentListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "course", "email", ...META_SORT_FIELDS]).optional(),
  course: z.string().trim().min(1).optional(),
});

export type StudentListQuery = z.infer<typeof studentListQuerySchema>;
