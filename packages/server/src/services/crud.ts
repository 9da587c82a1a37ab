import { NotFoundError, ValidationError } from "../errors/app-error.js";
import type { Entity, FindOptions, Page } from "../models/common.js";
import { definedOnly } from "../repositories/ids.js";
import type { CrudRepository } from "../repositories/repository.js";

/**
 * Thin delegator between the routes and a repository. Absent identifiers
 * become {@link NotFoundError}s here; everything else passes straight through.
 */
export class CrudService<T extends Entity, C extends U, U extends object> {
  constructor(
    readonly entity: string,
    protected readonly repository: CrudRepository<T, C, U>,
  ) {}

  async create(input: C): Promise<T> {
    return this.repository.create(input);
  }

  /** Returns the record or throws {@link NotFoundError}. */
  async get(id: string): Promise<T> {
    const found = await this.repository.findById(id);
    if (!found) throw new NotFoundError(this.entity, id);
    return found;
  }

  async find(id: string): Promise<T | null> {
    return this.repository.findById(id);
  }

  async list(options: FindOptions<T> = {}): Promise<Page<T>> {
    return this.repository.findAll(options);
  }

  /** Full update: optional fields missing from `input` are reset. */
  async replace(id: string, input: C): Promise<T> {
    return this.updateExisting(id, this.replacement(input));
  }

  async patch(id: string, patch: U): Promise<T> {
    if (Object.keys(definedOnly(patch)).length === 0) {
      throw new ValidationError(`Nothing to update on ${this.entity}`, [
        { path: "(root)", message: "at least one field must be provided" },
      ]);
    }
    return this.updateExisting(id, patch);
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.repository.deleteById(id);
    if (!deleted) throw new NotFoundError(this.entity, id);
  }

  async count(): Promise<number> {
    return this.repository.count();
  }

  /** Maps a full input to the patch that overwrites every field. */
  protected replacement(input: C): U {
    return input;
  }

  protected async updateExisting(id: string, changes: U): Promise<T> {
    const updated = await this.repository.update(id, changes);
    if (!updated) throw new NotFoundError(this.entity, id);
    return updated;
  }
}
