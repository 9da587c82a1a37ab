import { ConflictError, ValidationError } from "../errors/app-error.js";
import { resolvePaging, toPage, type Entity, type FindOptions, type Page } from "../models/common.js";
import { definedOnly, newId, timestamp } from "./ids.js";
import type { CrudRepository, IdFactory } from "./repository.js";

/** Turns validated input into a full record, given the generated metadata. */
export type RecordBuilder<T extends Entity, C> = (input: C, meta: Entity) => T;

export interface CollectionMapping<T extends Entity> {
  /** Human name used in error messages, e.g. "Product". */
  entity: string;
  prefix: string;
  /** Scalar fields that can be sorted and filtered on. `id` and the timestamps are implied. */
  fields: ReadonlyArray<keyof T & string>;
  /** Field groups that are unique together. A group holding a null is not checked. */
  uniqueKeys?: ReadonlyArray<ReadonlyArray<keyof T & string>>;
}

const META_FIELDS: ReadonlyArray<string> = ["id", "createdAt", "updatedAt"];

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  // nulls sort first, as in SQLite
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Map-backed repository. Insertion order of the map is the tie-break for
 * sorting, matching the rowid order of the SQLite backend. Callers only ever
 * see copies of the stored records.
 */
export class InMemoryRepository<T extends Entity, C extends object, U extends object = Partial<C>>
  implements CrudRepository<T, C, U>
{
  protected readonly records = new Map<string, T>();

  constructor(
    protected readonly mapping: CollectionMapping<T>,
    private readonly build: RecordBuilder<T, C>,
    private readonly idFactory: IdFactory = newId,
  ) {}

  async create(input: C): Promise<T> {
    const now = timestamp();
    const record = this.build(input, { id: this.idFactory(this.mapping.prefix), createdAt: now, updatedAt: now });
    this.ensureUnique(record);
    this.records.set(record.id, structuredClone(record));
    return record;
  }

  async findById(id: string): Promise<T | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async findAll(options: FindOptions<T> = {}): Promise<Page<T>> {
    const { page, size, offset } = resolvePaging(options);
    let matches = this.match(options.where);

    if (options.search) {
      const { field, term } = options.search;
      this.checkField(field, "filter");
      const needle = term.toLowerCase();
      matches = matches.filter((record) => {
        const value = record[field];
        return typeof value === "string" && value.toLowerCase().includes(needle);
      });
    }

    if (options.sort) {
      const { field, direction } = options.sort;
      this.checkField(field, "sort");
      const sign = direction === "desc" ? -1 : 1;
      // Array.prototype.sort is stable, so ties keep insertion order
      matches = [...matches].sort((a, b) => sign * compareValues(a[field], b[field]));
    }

    return toPage(matches.slice(offset, offset + size).map((record) => structuredClone(record)), matches.length, page, size);
  }

  async findBy(where: Partial<T>): Promise<T[]> {
    return this.match(where).map((record) => structuredClone(record));
  }

  async update(id: string, patch: U): Promise<T | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const next: T = { ...existing, ...definedOnly(patch), id: existing.id, createdAt: existing.createdAt, updatedAt: timestamp() };
    this.ensureUnique(next);
    this.records.set(id, structuredClone(next));
    return next;
  }

  async deleteById(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async existsById(id: string): Promise<boolean> {
    return this.records.has(id);
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  /* ---------------------------------------------------------------- */

  private checkField(field: string, purpose: "sort" | "filter"): void {
    if (META_FIELDS.includes(field) || this.mapping.fields.some((known) => known === field)) return;
    throw new ValidationError(`Cannot ${purpose} ${this.mapping.entity} by '${field}'`, [
      { path: field, message: `not a ${purpose}able field` },
    ]);
  }

  /** Runs synchronously between the check and the write, like a UNIQUE index. */
  private ensureUnique(candidate: T): void {
    for (const key of this.mapping.uniqueKeys ?? []) {
      if (key.some((field) => candidate[field] === null || candidate[field] === undefined)) continue;
      for (const record of this.records.values()) {
        if (record.id === candidate.id) continue;
        if (key.every((field) => record[field] === candidate[field])) {
          throw new ConflictError(`${this.mapping.entity} already exists (${key.join(", ")})`);
        }
      }
    }
  }

  private match(where: Partial<T> | undefined): T[] {
    const all = [...this.records.values()];
    if (!where) return all;
    const filters = definedOnly(where);
    for (const key in filters) {
      this.checkField(key, "filter");
      if (Array.isArray(filters[key])) {
        throw new ValidationError(`Cannot filter ${this.mapping.entity} by '${key}'`, [
          { path: key, message: "not a scalar value" },
        ]);
      }
    }
    return all.filter((record) => {
      for (const key in filters) {
        if (record[key] !== filters[key]) return false;
      }
      return true;
    });
  }
}
