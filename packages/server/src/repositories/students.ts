import type { Database } from "better-sqlite3";
import type { StudentRow } from "../db/schema.js";
import type { Student, StudentInput, StudentPatch } from "../models/student.js";
import { InMemoryRepository, type RecordBuilder } from "./memory-repository.js";
import type { CrudRepository } from "./repository.js";
import { SqliteRepository } from "./sqlite-repository.js";

export type StudentRepository = CrudRepository<Student, StudentInput, StudentPatch>;

export class SqliteStudentRepository
  extends SqliteRepository<Student, StudentInput, StudentPatch, StudentRow>
  implements StudentRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "Student",
      table: "students",
      prefix: "stu",
      columns: { name: "name", course: "course", email: "email" },
    });
  }

  protected toEntity(row: StudentRow): Student {
    return {
      id: row.id,
      name: row.name,
      course: row.course,
      email: row.email,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export const buildStudent: RecordBuilder<Student, StudentInput> = (input, meta) => ({
  ...meta,
  name: input.name,
  course: input.course,
  email: input.email ?? null,
});

export function createInMemoryStudentRepository(): StudentRepository {
  return new InMemoryRepository<Student, StudentInput, StudentPatch>(
    { entity: "Student", prefix: "stu", fields: ["name", "course", "email"] },
    buildStudent,
  );
}
