import { z } from "zod";
import { ValidationError } from "../errors/app-error.js";

/** Fields every persisted record carries. */
export interface Entity {
  id: string;
  createdAt: string;
  updatedAt: string;
}

/** Fields the persistence layer owns; never accepted as input. */
export type EntityMeta = keyof Entity;

export type SortDirection = "asc" | "desc";

export interface Sort<T> {
  field: keyof T & string;
  direction: SortDirection;
}

export interface FindOptions<T> {
  /** 1-based page number. */
  page?: number;
  size?: number;
  sort?: Sort<T>;
  /** Equality filters, ANDed together. */
  where?: Partial<T>;
  /** Case-insensitive substring match on a single field. */
  search?: { field: keyof T & string; term: string };
}

export interface Page<T> {
  items: T[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function resolvePaging(options: Pick<FindOptions<unknown>, "page" | "size">): { page: number; size: number; offset: number } {
  const page = Math.max(1, Math.floor(options.page ?? 1));
  const size = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(options.size ?? DEFAULT_PAGE_SIZE)));
  return { page, size, offset: (page - 1) * size };
}

export function toPage<T>(items: T[], total: number, page: number, size: number): Page<T> {
  return { items, page, size, total, totalPages: Math.ceil(total / size) };
}

/* ------------------------------------------------------------------ */
/*  Request parsing                                                    */
/* ------------------------------------------------------------------ */

/** Query parameters shared by every list endpoint. */
export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  direction: z.enum(["asc", "desc"]).default("asc"),
});

export type PageQuery = z.infer<typeof pageQuerySchema>;

/** Sort keys every entity accepts in addition to its own scalar fields. */
export const META_SORT_FIELDS = ["createdAt", "updatedAt"] as const;

/**
 * Parses `value` with `schema`, converting zod issues into a
 * {@link ValidationError} the error handler answers with 400.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what = "request body"): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  throw new ValidationError(
    `Invalid ${what}`,
    result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    })),
  );
}

/** Makes every field optional and rejects an object with no fields at all. */
export function patchOf<S extends z.ZodRawShape>(schema: z.ZodObject<S>) {
  return schema.partial().refine((value) => Object.values(value).some((v) => v !== undefined), {
    message: "at least one field must be provided",
  });
}

export const nameField = z.string().trim().min(1).max(200);
