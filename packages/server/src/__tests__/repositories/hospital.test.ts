import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConflictError, ValidationError } from "../../errors/app-error.js";
import {
  SqliteBedRepository,
  SqliteDoctorRepository,
  SqliteMedicalLabRepository,
  SqlitePatientRepository,
} from "../../repositories/hospital.js";
import { createTestDb, type TestDb } from "../helpers/db.js";

describe("SqlitePatientRepository", () => {
  let db: TestDb;
  let patients: SqlitePatientRepository;
  let labs: SqliteMedicalLabRepository;
  let labA: string;
  let labB: string;

  beforeEach(async () => {
    db = createTestDb();
    patients = new SqlitePatientRepository(db);
    labs = new SqliteMedicalLabRepository(db);
    labA = (await labs.create({ name: "Haematology", labType: "blood" })).id;
    labB = (await labs.create({ name: "Radiology", labType: "imaging" })).id;
  });

  afterEach(() => {
    db.close();
  });

  it("stores lab assignments in the join table", async () => {
    const bo = await patients.create({ name: "Bo", age: 40, labIds: [labB, labA] });

    expect(bo).toMatchObject({ name: "Bo", age: 40, doctorId: null, bedId: null, canteenId: null, labIds: [labB, labA] });
    const links = db.prepare("SELECT lab_id FROM patient_labs WHERE patient_id = ? ORDER BY rowid").all(bo.id);
    expect(links).toEqual([{ lab_id: labB }, { lab_id: labA }]);
  });

  it("rewrites the assignments only when labIds is part of the update", async () => {
    const bo = await patients.create({ name: "Bo", age: 40, labIds: [labA, labB] });

    const renamed = await patients.update(bo.id, { name: "Bo Jr" });
    expect(renamed?.labIds).toEqual([labA, labB]);

    const reassigned = await patients.update(bo.id, { labIds: [labB] });
    expect(reassigned?.labIds).toEqual([labB]);
    expect(reassigned?.name).toBe("Bo Jr");
  });

  it("hydrates lab ids for every patient on a page", async () => {
    await patients.create({ name: "Bo", age: 40, labIds: [labA] });
    await patients.create({ name: "Cy", age: 22 });
    await patients.create({ name: "Di", age: 31, labIds: [labA, labB] });

    const page = await patients.findAll({ sort: { field: "age", direction: "asc" } });
    expect(page.items.map((p) => [p.name, p.labIds])).toEqual([
      ["Cy", []],
      ["Di", [labA, labB]],
      ["Bo", [labA]],
    ]);
  });

  it("finds patients by lab", async () => {
    await patients.create({ name: "Bo", age: 40, labIds: [labA] });
    await patients.create({ name: "Cy", age: 22, labIds: [labB] });
    await patients.create({ name: "Di", age: 31, labIds: [labB, labA] });

    expect((await patients.findByLabId(labA)).map((p) => p.name)).toEqual(["Bo", "Di"]);
    expect(await patients.findByLabId("lab_missing")).toEqual([]);
  });

  it("rejects references to records that do not exist", async () => {
    await expect(patients.create({ name: "Bo", age: 40, doctorId: "doc_missing" })).rejects.toThrow(ValidationError);
    await expect(patients.create({ name: "Bo", age: 40, labIds: ["lab_missing"] })).rejects.toThrow(ValidationError);
    expect(await patients.count()).toBe(0);
  });

  it("lets a bed hold a single patient", async () => {
    const bed = await new SqliteBedRepository(db).create({ ward: "North", number: 1 });
    await patients.create({ name: "Bo", age: 40, bedId: bed.id });

    await expect(patients.create({ name: "Cy", age: 22, bedId: bed.id })).rejects.toThrow(
      new ConflictError("Patient already exists (patients.bed_id)"),
    );
  });

  it("clears references when the referenced row is deleted", async () => {
    const doctor = await new SqliteDoctorRepository(db).create({ name: "Dr Who", specialization: "General" });
    const bo = await patients.create({ name: "Bo", age: 40, doctorId: doctor.id, labIds: [labA, labB] });

    await new SqliteDoctorRepository(db).deleteById(doctor.id);
    await labs.deleteById(labA);

    expect(await patients.findById(bo.id)).toMatchObject({ doctorId: null, labIds: [labB] });
  });

  it("only sorts and filters on mapped columns", async () => {
    await expect(patients.findAll({ sort: { field: "labIds", direction: "asc" } })).rejects.toThrow(
      "Cannot sort Patient by 'labIds'",
    );
    await expect(patients.findBy({ labIds: [labA] })).rejects.toThrow("Cannot filter Patient by 'labIds'");
  });
});

describe("SqliteBedRepository", () => {
  it("keeps ward and number unique together", async () => {
    const db = createTestDb();
    try {
      const beds = new SqliteBedRepository(db);
      await beds.create({ ward: "North", number: 1 });
      await beds.create({ ward: "South", number: 1 });

      await expect(beds.create({ ward: "North", number: 1 })).rejects.toThrow(
        new ConflictError("Bed already exists (beds.ward, beds.number)"),
      );
    } finally {
      db.close();
    }
  });
});
