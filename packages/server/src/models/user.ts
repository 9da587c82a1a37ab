import { z } from "zod";
import { META_SORT_FIELDS, nameField, pageQuerySchema, patchOf, type Entity } from "./common.js";

export interface User extends Entity {
  name: string;
  /** Stored lower-cased; unique across users. */
  email: string;
}

export const userInputSchema = z.object({
  name: nameField,
  email: z.string().trim().toLowerCase().email(),
});

export const userPatchSchema = patchOf(userInputSchema);

export type UserInput = z.infer<typeof userInputSchema>;
export type UserPatch = z.infer<typeof userPatchSchema>;

export const userListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "email", ...META_SORT_FIELDS]).optional(),
  email: z.string().trim().toLowerCase().optional(),
});

export type UserListQuery = z.infer<typeof userListQuerySchema>;
