import type { Entity, FindOptions, Page } from "../models/common.js";

/**
 * Narrow persistence capability shared by every backend.
 *
 * Absent identifiers are never errors at this layer: lookups return `null`,
 * updates return `null` and deletes return `false`. Undefined values in a
 * patch leave the stored field unchanged.
 */
export interface CrudRepository<T extends Entity, C, U = Partial<C>> {
  create(input: C): Promise<T>;
  findById(id: string): Promise<T | null>;
  findAll(options?: FindOptions<T>): Promise<Page<T>>;
  /** Unpaged equality lookup in insertion order. */
  findBy(where: Partial<T>): Promise<T[]>;
  update(id: string, patch: U): Promise<T | null>;
  deleteById(id: string): Promise<boolean>;
  existsById(id: string): Promise<boolean>;
  count(): Promise<number>;
}

/** Builds a fresh identifier: `<prefix>_<16 url-safe chars>`. */
export type IdFactory = (prefix: string) => string;
