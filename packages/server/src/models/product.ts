import { z } from "zod";
import { META_SORT_FIELDS, nameField, pageQuerySchema, patchOf, type Entity } from "./common.js";

export interface Product extends Entity {
  name: string;
  price: number;
  description: string | null;
}

export const productInputSchema = z.object({
  name: nameField,
  price: z.number().finite().nonnegative(),
  description: z.string().max(2000).nullable().optional(),
});

export const productPatchSchema = patchOf(productInputSchema);

export type ProductInput = z.infer<typeof productInputSchema>;
export type ProductPatch = z.infer<typeof productPatchSchema>;

export const productListQuerySchema = pageQuerySchema.extend({
  sort: z.enum(["name", "price", "description", ...META_SORT_FIELDS]).optional(),
  name: z.string().trim().min(1).optional(),
});

export type ProductListQuery = z.infer<typeof productListQuerySchema>;
