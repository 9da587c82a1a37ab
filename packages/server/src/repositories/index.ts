import type { Database } from "better-sqlite3";
import {
  createInMemoryHospitalRepositories,
  SqliteBedRepository,
  SqliteCanteenRepository,
  SqliteDoctorRepository,
  SqliteMedicalLabRepository,
  SqlitePatientRepository,
  type BedRepository,
  type CanteenRepository,
  type DoctorRepository,
  type MedicalLabRepository,
  type PatientRepository,
} from "./hospital.js";
import { createInMemoryProductRepository, SqliteProductRepository, type ProductRepository } from "./products.js";
import { createInMemoryStudentRepository, SqliteStudentRepository, type StudentRepository } from "./students.js";
import { createInMemoryUserRepository, SqliteUserRepository, type UserRepository } from "./users.js";

export interface Repositories {
  products: ProductRepository;
  students: StudentRepository;
  users: UserRepository;
  doctors: DoctorRepository;
  beds: BedRepository;
  canteens: CanteenRepository;
  medicalLabs: MedicalLabRepository;
  patients: PatientRepository;
}

export function createSqliteRepositories(db: Database): Repositories {
  return {
    products: new SqliteProductRepository(db),
    students: new SqliteStudentRepository(db),
    users: new SqliteUserRepository(db),
    doctors: new SqliteDoctorRepository(db),
    beds: new SqliteBedRepository(db),
    canteens: new SqliteCanteenRepository(db),
    medicalLabs: new SqliteMedicalLabRepository(db),
    patients: new SqlitePatientRepository(db),
  };
}

export function createInMemoryRepositories(): Repositories {
  return {
    products: createInMemoryProductRepository(),
    students: createInMemoryStudentRepository(),
    users: createInMemoryUserRepository(),
    ...createInMemoryHospitalRepositories(),
  };
}

export type { CrudRepository } from "./repository.js";
