import type { FastifyInstance } from "fastify";
import type { z } from "zod";
import { parseInput, type Entity, type FindOptions, type PageQuery } from "../models/common.js";
import type { CrudService } from "../services/crud.js";

export type IdParams = { id: string };

type ListQuery<T> = PageQuery & { sort?: keyof T & string };

export interface CrudRouteDefinition<T extends Entity, C extends U, U extends object, Q extends ListQuery<T>> {
  /** Collection path, e.g. `/api/products`. */
  path: string;
  service: CrudService<T, C, U>;
  inputSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
  patchSchema: z.ZodType<U, z.ZodTypeDef, unknown>;
  listQuerySchema: z.ZodType<Q, z.ZodTypeDef, unknown>;
  /** Entity-specific list filters taken from the parsed query. */
  filters?: (query: Q) => Pick<FindOptions<T>, "where" | "search">;
}

/**
 * Maps the six CRUD verbs of one resource onto its service:
 *
 *   GET    {path}       paged list     200
 *   GET    {path}/:id   fetch one      200
 *   POST   {path}       create         201
 *   PUT    {path}/:id   full replace   200
 *   PATCH  {path}/:id   partial update 200
 *   DELETE {path}/:id   remove         204
 */
export function registerCrudRoutes<T extends Entity, C extends U, U extends object, Q extends ListQuery<T>>(
  app: FastifyInstance,
  def: CrudRouteDefinition<T, C, U, Q>,
): void {
  const { path, service } = def;

  app.get(path, async (request, reply) => {
    const query = parseInput(def.listQuerySchema, request.query, "query string");
    const { page: pageNumber, size, sort, direction }: ListQuery<T> = query;
    const page = await service.list({
      page: pageNumber,
      size,
      sort: sort ? { field: sort, direction } : undefined,
      ...def.filters?.(query),
    });
    return reply.send(page);
  });

  app.get<{ Params: IdParams }>(`${path}/:id`, async (request, reply) => {
    return reply.send(await service.get(request.params.id));
  });

  app.post(path, async (request, reply) => {
    const created = await service.create(parseInput(def.inputSchema, request.body));
    return reply.code(201).send(created);
  });

  app.put<{ Params: IdParams }>(`${path}/:id`, async (request, reply) => {
    const input = parseInput(def.inputSchema, request.body);
    return reply.send(await service.replace(request.params.id, input));
  });

  app.patch<{ Params: IdParams }>(`${path}/:id`, async (request, reply) => {
    const patch = parseInput(def.patchSchema, request.body);
    return reply.send(await service.patch(request.params.id, patch));
  });

  app.delete<{ Params: IdParams }>(`${path}/:id`, async (request, reply) => {
    await service.delete(request.params.id);
    return reply.code(204).send();
  });
}
