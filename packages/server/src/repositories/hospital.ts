import type { Database } from "better-sqlite3";
import type { BedRow, CanteenRow, DoctorRow, MedicalLabRow, PatientLabRow, PatientRow } from "../db/schema.js";
import type {
  Bed,
  BedInput,
  BedPatch,
  Canteen,
  CanteenInput,
  CanteenPatch,
  Doctor,
  DoctorInput,
  DoctorPatch,
  MedicalLab,
  MedicalLabInput,
  MedicalLabPatch,
  Patient,
  PatientInput,
  PatientPatch,
} from "../models/hospital.js";
import { InMemoryRepository } from "./memory-repository.js";
import type { CrudRepository } from "./repository.js";
import { SqliteRepository } from "./sqlite-repository.js";

export type DoctorRepository = CrudRepository<Doctor, DoctorInput, DoctorPatch>;
export type BedRepository = CrudRepository<Bed, BedInput, BedPatch>;
export type CanteenRepository = CrudRepository<Canteen, CanteenInput, CanteenPatch>;
export type MedicalLabRepository = CrudRepository<MedicalLab, MedicalLabInput, MedicalLabPatch>;

export interface PatientRepository extends CrudRepository<Patient, PatientInput, PatientPatch> {
  /** Patients sent to the given lab, in insertion order. */
  findByLabId(labId: string): Promise<Patient[]>;
}

/* ------------------------------------------------------------------ */
/*  SQLite                                                             */
/* ------------------------------------------------------------------ */

export class SqliteDoctorRepository
  extends SqliteRepository<Doctor, DoctorInput, DoctorPatch, DoctorRow>
  implements DoctorRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "Doctor",
      table: "doctors",
      prefix: "doc",
      columns: { name: "name", specialization: "specialization" },
    });
  }

  protected toEntity(row: DoctorRow): Doctor {
    return {
      id: row.id,
      name: row.name,
      specialization: row.specialization,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export class SqliteBedRepository extends SqliteRepository<Bed, BedInput, BedPatch, BedRow> implements BedRepository {
  constructor(db: Database) {
    super(db, {
      entity: "Bed",
      table: "beds",
      prefix: "bed",
      columns: { ward: "ward", number: "number" },
    });
  }

  protected toEntity(row: BedRow): Bed {
    return {
      id: row.id,
      ward: row.ward,
      number: row.number,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export class SqliteCanteenRepository
  extends SqliteRepository<Canteen, CanteenInput, CanteenPatch, CanteenRow>
  implements CanteenRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "Canteen",
      table: "canteens",
      prefix: "cnt",
      columns: { name: "name", location: "location" },
    });
  }

  protected toEntity(row: CanteenRow): Canteen {
    return {
      id: row.id,
      name: row.name,
      location: row.location,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export class SqliteMedicalLabRepository
  extends SqliteRepository<MedicalLab, MedicalLabInput, MedicalLabPatch, MedicalLabRow>
  implements MedicalLabRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "MedicalLab",
      table: "medical_labs",
      prefix: "lab",
      columns: { name: "name", labType: "lab_type" },
    });
  }

  protected toEntity(row: MedicalLabRow): MedicalLab {
    return {
      id: row.id,
      name: row.name,
      labType: row.lab_type,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

/**
 * Patients keep their lab assignments in `patient_labs`; the join rows are
 * rewritten whenever `labIds` is part of a create or update.
 */
export class SqlitePatientRepository
  extends SqliteRepository<Patient, PatientInput, PatientPatch, PatientRow>
  implements PatientRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "Patient",
      table: "patients",
      prefix: "pat",
      columns: { name: "name", age: "age", doctorId: "doctor_id", bedId: "bed_id", canteenId: "canteen_id" },
    });
  }

  async findByLabId(labId: string): Promise<Patient[]> {
    const rows = this.db
      .prepare(
        `SELECT p.* FROM patients p
           JOIN patient_labs pl ON pl.patient_id = p.id
         WHERE pl.lab_id = ?
         ORDER BY p.rowid ASC`,
      )
      .all(labId) as PatientRow[];
    return this.hydrate(rows);
  }

  protected toEntity(row: PatientRow): Patient {
    return {
      id: row.id,
      name: row.name,
      age: row.age,
      doctorId: row.doctor_id,
      bedId: row.bed_id,
      canteenId: row.canteen_id,
      labIds: [],
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  protected override hydrate(rows: PatientRow[]): Patient[] {
    if (rows.length === 0) return [];
    const ids = rows.map((r) => r.id);
    const links = this.db
      .prepare(
        `SELECT patient_id, lab_id FROM patient_labs
         WHERE patient_id IN (${ids.map(() => "?").join(", ")})
         ORDER BY rowid ASC`,
      )
      .all(...ids) as PatientLabRow[];

    const labsByPatient = new Map<string, string[]>();
    for (const link of links) {
      const labs = labsByPatient.get(link.patient_id) ?? [];
      labs.push(link.lab_id);
      labsByPatient.set(link.patient_id, labs);
    }

    return super.hydrate(rows).map((patient) => ({ ...patient, labIds: labsByPatient.get(patient.id) ?? [] }));
  }

  protected override afterWrite(id: string, changes: PatientInput | PatientPatch): void {
    if (changes.labIds === undefined) return;
    this.db.prepare("DELETE FROM patient_labs WHERE patient_id = ?").run(id);
    const insert = this.db.prepare("INSERT OR IGNORE INTO patient_labs (patient_id, lab_id) VALUES (?, ?)");
    for (const labId of changes.labIds) insert.run(id, labId);
  }
}

/* ------------------------------------------------------------------ */
/*  In-memory                                                          */
/* ------------------------------------------------------------------ */

export class InMemoryPatientRepository
  extends InMemoryRepository<Patient, PatientInput, PatientPatch>
  implements PatientRepository
{
  constructor() {
    super(
      {
        entity: "Patient",
        prefix: "pat",
        fields: ["name", "age", "doctorId", "bedId", "canteenId"],
        uniqueKeys: [["bedId"]],
      },
      (input, meta) => ({
        ...meta,
        name: input.name,
        age: input.age,
        doctorId: input.doctorId ?? null,
        bedId: input.bedId ?? null,
        canteenId: input.canteenId ?? null,
        labIds: [...new Set(input.labIds ?? [])],
      }),
    );
  }

  async findByLabId(labId: string): Promise<Patient[]> {
    return [...this.records.values()].filter((p) => p.labIds.includes(labId)).map((p) => structuredClone(p));
  }
}

export function createInMemoryHospitalRepositories(): {
  doctors: DoctorRepository;
  beds: BedRepository;
  canteens: CanteenRepository;
  medicalLabs: MedicalLabRepository;
  patients: PatientRepository;
} {
  return {
    doctors: new InMemoryRepository<Doctor, DoctorInput, DoctorPatch>(
      { entity: "Doctor", prefix: "doc", fields: ["name", "specialization"] },
      (input, meta) => ({ ...meta, name: input.name, specialization: input.specialization }),
    ),
    beds: new InMemoryRepository<Bed, BedInput, BedPatch>(
      { entity: "Bed", prefix: "bed", fields: ["ward", "number"], uniqueKeys: [["ward", "number"]] },
      (input, meta) => ({ ...meta, ward: input.ward, number: input.number }),
    ),
    canteens: new InMemoryRepository<Canteen, CanteenInput, CanteenPatch>(
      { entity: "Canteen", prefix: "cnt", fields: ["name", "location"] },
      (input, meta) => ({ ...meta, name: input.name, location: input.location ?? null }),
    ),
    medicalLabs: new InMemoryRepository<MedicalLab, MedicalLabInput, MedicalLabPatch>(
      { entity: "MedicalLab", prefix: "lab", fields: ["name", "labType"] },
      (input, meta) => ({ ...meta, name: input.name, labType: input.labType }),
    ),
    patients: new InMemoryPatientRepository(),
  };
}
