import type { Database } from "better-sqlite3";
import { AppError, ConflictError, DatabaseError, ValidationError } from "../errors/app-error.js";
import { resolvePaging, toPage, type Entity, type FindOptions, type Page } from "../models/common.js";
import { newId, timestamp } from "./ids.js";
import type { CrudRepository, IdFactory } from "./repository.js";

export type SqlValue = string | number | bigint | null;

/** Columns every application table carries. */
export interface EntityRow {
  id: string;
  created_at: string;
  updated_at: string;
}

export interface TableMapping {
  /** Human name used in error messages, e.g. "Product". */
  entity: string;
  table: string;
  prefix: string;
  /** Scalar entity field → column. `id` and the timestamps are implied. */
  columns: Record<string, string>;
}

const META_COLUMNS: Record<string, string> = {
  id: "id",
  createdAt: "created_at",
  updatedAt: "updated_at",
};

function toSqlValue(value: unknown): SqlValue | undefined {
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "bigint") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  return undefined;
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

const foldingRegistered = new WeakSet<Database>();

/**
 * SQLite's own `lower()` and `LIKE` only fold ASCII. Search folds both sides
 * through JavaScript instead, so "CAFÉ" finds "Café" on every backend.
 */
function registerCaseFolding(db: Database): void {
  if (foldingRegistered.has(db)) return;
  db.function("fold_case", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value,
  );
  foldingRegistered.add(db);
}

/**
 * Translates driver constraint failures into application errors. Anything
 * else becomes a {@link DatabaseError}.
 */
export function translateSqliteError(err: unknown, entity: string): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    const detail = err.message.split(": ")[1] ?? err.message;
    if (err.code === "SQLITE_CONSTRAINT_UNIQUE" || err.code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
      return new ConflictError(`${entity} already exists (${detail})`);
    }
    if (err.code === "SQLITE_CONSTRAINT_FOREIGNKEY") {
      return new ValidationError(`${entity} references a record that does not exist`);
    }
  }
  const message = err instanceof Error ? err.message : String(err);
  return new DatabaseError(`${entity}: ${message}`, err instanceof Error ? err : undefined);
}

/**
 * better-sqlite3 backed repository. Subclasses supply the row → entity
 * mapping; inserts and updates are built from the column map so only mapped
 * fields ever reach SQL.
 */
export abstract class SqliteRepository<T extends Entity, C extends object, U extends object, R extends EntityRow>
  implements CrudRepository<T, C, U>
{
  constructor(
    protected readonly db: Database,
    protected readonly mapping: TableMapping,
    private readonly idFactory: IdFactory = newId,
  ) {
    registerCaseFolding(db);
  }

  protected abstract toEntity(row: R): T;

  /** Hook for association tables; runs inside the write transaction. */
  protected afterWrite(_id: string, _changes: C | U): void {}

  protected hydrate(rows: R[]): T[] {
    return rows.map((row) => this.toEntity(row));
  }

  async create(input: C): Promise<T> {
    const id = this.idFactory(this.mapping.prefix);
    const now = timestamp();
    const assignments: Array<readonly [string, SqlValue]> = [
      ...this.toColumns(input),
      ["created_at", now],
      ["updated_at", now],
    ];
    const columns = ["id", ...assignments.map(([column]) => column)];
    const values: SqlValue[] = [id, ...assignments.map(([, value]) => value)];

    this.write(() => {
      this.db
        .prepare(`INSERT INTO ${this.mapping.table} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`)
        .run(...values);
      this.afterWrite(id, input);
    });

    return this.requireById(id);
  }

  async findById(id: string): Promise<T | null> {
    return this.getById(id);
  }

  async findAll(options: FindOptions<T> = {}): Promise<Page<T>> {
    const { page, size, offset } = resolvePaging(options);
    const { clause, params } = this.buildWhere(options.where, options.search);

    const total = (this.db
      .prepare(`SELECT COUNT(*) AS n FROM ${this.mapping.table}${clause}`)
      .get(...params) as { n: number }).n;

    const order = options.sort
      ? `${this.columnFor(options.sort.field, "sort")} ${options.sort.direction === "desc" ? "DESC" : "ASC"}, rowid ASC`
      : "rowid ASC";

    const rows = this.db
      .prepare(`SELECT * FROM ${this.mapping.table}${clause} ORDER BY ${order} LIMIT ? OFFSET ?`)
      .all(...params, size, offset) as R[];

    return toPage(this.hydrate(rows), total, page, size);
  }

  async findBy(where: Partial<T>): Promise<T[]> {
    const { clause, params } = this.buildWhere(where);
    const rows = this.db
      .prepare(`SELECT * FROM ${this.mapping.table}${clause} ORDER BY rowid ASC`)
      .all(...params) as R[];
    return this.hydrate(rows);
  }

  async update(id: string, patch: U): Promise<T | null> {
    if (!this.exists(id)) return null;

    const assignments = this.toColumns(patch);
    const sets = [...assignments.map(([column]) => `${column} = ?`), "updated_at = ?"];
    const values: SqlValue[] = [...assignments.map(([, value]) => value), timestamp(), id];

    this.write(() => {
      this.db.prepare(`UPDATE ${this.mapping.table} SET ${sets.join(", ")} WHERE id = ?`).run(...values);
      this.afterWrite(id, patch);
    });

    return this.getById(id);
  }

  async deleteById(id: string): Promise<boolean> {
    try {
      const info = this.db.prepare(`DELETE FROM ${this.mapping.table} WHERE id = ?`).run(id);
      return info.changes > 0;
    } catch (err) {
      throw translateSqliteError(err, this.mapping.entity);
    }
  }

  async existsById(id: string): Promise<boolean> {
    return this.exists(id);
  }

  async count(): Promise<number> {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM ${this.mapping.table}`).get() as { n: number };
    return row.n;
  }

  /* ---------------------------------------------------------------- */

  private write(fn: () => void): void {
    try {
      this.db.transaction(fn)();
    } catch (err) {
      throw translateSqliteError(err, this.mapping.entity);
    }
  }

  private exists(id: string): boolean {
    return this.db.prepare(`SELECT 1 FROM ${this.mapping.table} WHERE id = ?`).get(id) !== undefined;
  }

  private getById(id: string): T | null {
    const row = this.db.prepare(`SELECT * FROM ${this.mapping.table} WHERE id = ?`).get(id) as R | undefined;
    if (!row) return null;
    return this.hydrate([row])[0] ?? null;
  }

  private requireById(id: string): T {
    const entity = this.getById(id);
    if (!entity) throw new DatabaseError(`${this.mapping.entity} '${id}' vanished after insert`);
    return entity;
  }

  private columnFor(field: string, purpose: "sort" | "filter"): string {
    const column = META_COLUMNS[field] ?? this.mapping.columns[field];
    if (!column) {
      throw new ValidationError(`Cannot ${purpose} ${this.mapping.entity} by '${field}'`, [
        { path: field, message: `not a ${purpose}able field` },
      ]);
    }
    return column;
  }

  private toColumns(input: object): Array<readonly [string, SqlValue]> {
    const assignments: Array<readonly [string, SqlValue]> = [];
    for (const [field, raw] of Object.entries(input)) {
      const column = this.mapping.columns[field];
      const value = toSqlValue(raw);
      if (column && value !== undefined) assignments.push([column, value]);
    }
    return assignments;
  }

  private buildWhere(
    where: Partial<T> | undefined,
    search?: FindOptions<T>["search"],
  ): { clause: string; params: SqlValue[] } {
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    for (const [field, raw] of Object.entries(where ?? {})) {
      if (raw === undefined) continue;
      const column = this.columnFor(field, "filter");
      const value = toSqlValue(raw);
      if (value === undefined) {
        throw new ValidationError(`Cannot filter ${this.mapping.entity} by '${field}'`, [
          { path: field, message: "not a scalar value" },
        ]);
      }
      if (value === null) {
        conditions.push(`${column} IS NULL`);
      } else {
        conditions.push(`${column} = ?`);
        params.push(value);
      }
    }

    if (search) {
      conditions.push(`fold_case(${this.columnFor(search.field, "filter")}) LIKE ? ESCAPE '\\'`);
      params.push(`%${escapeLike(search.term.toLowerCase())}%`);
    }

    return { clause: conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "", params };
  }
}
