import type { FastifyInstance } from "fastify";
import { productInputSchema, productListQuerySchema, productPatchSchema } from "../models/product.js";
import { studentInputSchema, studentListQuerySchema, studentPatchSchema } from "../models/student.js";
import { userInputSchema, userListQuerySchema, userPatchSchema } from "../models/user.js";
import type { Services } from "../services/index.js";
import { registerCrudRoutes } from "./crud.js";

export type RouteOptions = { services: Services };

/** Products, students and users. */
export async function registerCatalogRoutes(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { products, students, users } = opts.services;

  registerCrudRoutes(app, {
    path: "/api/products",
    service: products,
    inputSchema: productInputSchema,
    patchSchema: productPatchSchema,
    listQuerySchema: productListQuerySchema,
    filters: (query) => ({ search: query.name ? { field: "name", term: query.name } : undefined }),
  });

  registerCrudRoutes(app, {
    path: "/api/students",
    service: students,
    inputSchema: studentInputSchema,
    patchSchema: studentPatchSchema,
    listQuerySchema: studentListQuerySchema,
    filters: (query) => ({ where: query.course ? { course: query.course } : undefined }),
  });

  registerCrudRoutes(app, {
    path: "/api/users",
    service: users,
    inputSchema: userInputSchema,
    patchSchema: userPatchSchema,
    listQuerySchema: userListQuerySchema,
    filters: (query) => ({ where: query.email ? { email: query.email } : undefined }),
  });
}
