import { ConflictError } from "../errors/app-error.js";
import type { Product, ProductInput, ProductPatch } from "../models/product.js";
import type { Student, StudentInput, StudentPatch } from "../models/student.js";
import type { User, UserInput, UserPatch } from "../models/user.js";
import type { ProductRepository } from "../repositories/products.js";
import type { StudentRepository } from "../repositories/students.js";
import type { UserRepository } from "../repositories/users.js";
import { CrudService } from "./crud.js";

export class ProductService extends CrudService<Product, ProductInput, ProductPatch> {
  constructor(repository: ProductRepository) {
    super("Product", repository);
  }

  protected override replacement(input: ProductInput): ProductPatch {
    return { ...input, description: input.description ?? null };
  }
}

export class StudentService extends CrudService<Student, StudentInput, StudentPatch> {
  constructor(repository: StudentRepository) {
    super("Student", repository);
  }

  protected override replacement(input: StudentInput): StudentPatch {
    return { ...input, email: input.email ?? null };
  }
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Users are unique by (case-insensitive) email. */
export class UserService extends CrudService<User, UserInput, UserPatch> {
  constructor(repository: UserRepository) {
    super("User", repository);
  }

  async findByEmail(email: string): Promise<User | null> {
    const [match] = await this.repository.findBy({ email: normalizeEmail(email) });
    return match ?? null;
  }

  override async create(input: UserInput): Promise<User> {
    const email = await this.claimEmail(input.email, null);
    return super.create({ ...input, email });
  }

  override async replace(id: string, input: UserInput): Promise<User> {
    await this.get(id);
    const email = await this.claimEmail(input.email, id);
    return super.replace(id, { ...input, email });
  }

  override async patch(id: string, patch: UserPatch): Promise<User> {
    await this.get(id);
    if (patch.email === undefined) return super.patch(id, patch);
    const email = await this.claimEmail(patch.email, id);
    return super.patch(id, { ...patch, email });
  }

  private async claimEmail(raw: string, ownerId: string | null): Promise<string> {
    const email = normalizeEmail(raw);
    const holder = await this.findByEmail(email);
    if (holder && holder.id !== ownerId) {
      throw new ConflictError(`A user with email '${email}' already exists`);
    }
    return email;
  }
}
