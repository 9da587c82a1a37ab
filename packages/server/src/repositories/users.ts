import type { Database } from "better-sqlite3";
import type { UserRow } from "../db/schema.js";
import type { User, UserInput, UserPatch } from "../models/user.js";
import { InMemoryRepository, type RecordBuilder } from "./memory-repository.js";
import type { CrudRepository } from "./repository.js";
import { SqliteRepository } from "./sqlite-repository.js";

export type UserRepository = CrudRepository<User, UserInput, UserPatch>;

export class SqliteUserRepository
  extends SqliteRepository<User, UserInput, UserPatch, UserRow>
  implements UserRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "User",
      table: "users",
      prefix: "usr",
      columns: { name: "name", email: "email" },
    });
  }

  protected toEntity(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      email: row.email,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export const buildUser: RecordBuilder<User, UserInput> = (input, meta) => ({
  ...meta,
  name: input.name,
  email: input.email,
});

export function createInMemoryUserRepository(): UserRepository {
  return new InMemoryRepository<User, UserInput, UserPatch>(
    { entity: "User", prefix: "usr", fields: ["name", "email"], uniqueKeys: [["email"]] },
    buildUser,
  );
}
