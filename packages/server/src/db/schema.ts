import type { Database } from "better-sqlite3";
import type { EntityRow } from "../repositories/sqlite-repository.js";

/* ------------------------------------------------------------------ */
/*  Row types                                                          */
/* ------------------------------------------------------------------ */

export interface ProductRow extends EntityRow {
  name: string;
  price: number;
  description: string | null;
}

export interface StudentRow extends EntityRow {
  name: string;
  course: string;
  email: string | null;
}

export interface UserRow extends EntityRow {
  name: string;
  email: string;
}

export interface DoctorRow extends EntityRow {
  name: string;
  specialization: string;
}

export interface BedRow extends EntityRow {
  ward: string;
  number: number;
}

export interface CanteenRow extends EntityRow {
  name: string;
  location: string | null;
}

export interface MedicalLabRow extends EntityRow {
  name: string;
  lab_type: string;
}

export interface PatientRow extends EntityRow {
  name: string;
  age: number;
  doctor_id: string | null;
  bed_id: string | null;
  canteen_id: string | null;
}

export interface PatientLabRow {
  patient_id: string;
  lab_id: string;
}

/**
 * Every table the application owns, in an order that is safe to drop
 * (children before parents).
 */
export const APPLICATION_TABLES = [
  "patient_labs",
  "patients",
  "medical_labs",
  "canteens",
  "beds",
  "doctors",
  "users",
  "students",
  "products",
] as const;

export type ApplicationTable = (typeof APPLICATION_TABLES)[number];

const TIMESTAMPS = `
  created_at  TEXT NOT NULL,
  updated_at  TEXT NOT NULL`;

/* ------------------------------------------------------------------ */
/*  DDL                                                                */
/* ------------------------------------------------------------------ */

export function createCatalogTables(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS products (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      price       REAL NOT NULL,
      description TEXT,${TIMESTAMPS}
    );

    CREATE TABLE IF NOT EXISTS students (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      course      TEXT NOT NULL,
      email       TEXT,${TIMESTAMPS}
    );
    CREATE INDEX IF NOT EXISTS idx_students_course ON students(course);

    CREATE TABLE IF NOT EXISTS users (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      email       TEXT NOT NULL,${TIMESTAMPS}
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users(email);
  `);
}

export function createHospitalTables(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS doctors (
      id              TEXT PRIMARY KEY,
      name            TEXT NOT NULL,
      specialization  TEXT NOT NULL,${TIMESTAMPS}
    );

    CREATE TABLE IF NOT EXISTS beds (
      id          TEXT PRIMARY KEY,
      ward        TEXT NOT NULL,
      number      INTEGER NOT NULL,${TIMESTAMPS},
      UNIQUE (ward, number)
    );

    CREATE TABLE IF NOT EXISTS canteens (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      location    TEXT,${TIMESTAMPS}
    );

    CREATE TABLE IF NOT EXISTS medical_labs (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      lab_type    TEXT NOT NULL,${TIMESTAMPS}
    );

    CREATE TABLE IF NOT EXISTS patients (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      age         INTEGER NOT NULL,
      doctor_id   TEXT REFERENCES doctors(id) ON DELETE SET NULL,
      bed_id      TEXT UNIQUE REFERENCES beds(id) ON DELETE SET NULL,
      canteen_id  TEXT REFERENCES canteens(id) ON DELETE SET NULL,${TIMESTAMPS}
    );
    CREATE INDEX IF NOT EXISTS idx_patients_doctor ON patients(doctor_id);
    CREATE INDEX IF NOT EXISTS idx_patients_canteen ON patients(canteen_id);

    CREATE TABLE IF NOT EXISTS patient_labs (
      patient_id  TEXT NOT NULL REFERENCES patients(id) ON DELETE CASCADE,
      lab_id      TEXT NOT NULL REFERENCES medical_labs(id) ON DELETE CASCADE,
      PRIMARY KEY (patient_id, lab_id)
    );
    CREATE INDEX IF NOT EXISTS idx_patient_labs_lab ON patient_labs(lab_id);
  `);
}

/** Names of the application tables missing from `db`. */
export function findMissingTables(db: Database): ApplicationTable[] {
  const present = new Set(
    (db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'").all() as Array<{ name: string }>).map(
      (r) => r.name,
    ),
  );
  return APPLICATION_TABLES.filter((table) => !present.has(table));
}

/** Drops every application table plus the migration ledger. */
export function dropSchema(db: Database): void {
  db.pragma("foreign_keys = OFF");
  try {
    db.transaction(() => {
      for (const table of APPLICATION_TABLES) db.exec(`DROP TABLE IF EXISTS ${table}`);
      db.exec("DROP TABLE IF EXISTS schema_version");
    })();
  } finally {
    db.pragma("foreign_keys = ON");
  }
}
