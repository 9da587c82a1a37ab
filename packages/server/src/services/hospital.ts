import { ConflictError, NotFoundError, ValidationError, type ValidationIssue } from "../errors/app-error.js";
import type { Entity } from "../models/common.js";
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
import type {
  BedRepository,
  CanteenRepository,
  DoctorRepository,
  MedicalLabRepository,
  PatientRepository,
} from "../repositories/hospital.js";
import type { CrudRepository } from "../repositories/repository.js";
import { CrudService } from "./crud.js";

type Existence = Pick<CrudRepository<Entity, object, object>, "existsById">;

/** How patients point at a record of the owning service. */
interface PatientLink {
  where: (id: string) => Partial<Patient>;
  detached: PatientPatch;
}

/**
 * Service for a record that patients reference through a single foreign
 * key. Deleting the record first clears that key on every patient, so the
 * outcome is the same on every backend.
 */
export class PatientOwnerService<T extends Entity, C extends U, U extends object> extends CrudService<T, C, U> {
  constructor(
    entity: string,
    repository: CrudRepository<T, C, U>,
    protected readonly patients: PatientRepository,
    private readonly link: PatientLink,
  ) {
    super(entity, repository);
  }

  /** Patients referencing `id`; throws {@link NotFoundError} when `id` is absent. */
  async patientsOf(id: string): Promise<Patient[]> {
    await this.get(id);
    return this.patients.findBy(this.link.where(id));
  }

  override async delete(id: string): Promise<void> {
    await this.get(id);
    for (const patient of await this.patients.findBy(this.link.where(id))) {
      await this.patients.update(patient.id, this.link.detached);
    }
    await super.delete(id);
  }
}

export class DoctorService extends PatientOwnerService<Doctor, DoctorInput, DoctorPatch> {
  constructor(repository: DoctorRepository, patients: PatientRepository) {
    super("Doctor", repository, patients, {
      where: (id) => ({ doctorId: id }),
      detached: { doctorId: null },
    });
  }
}

export class CanteenService extends PatientOwnerService<Canteen, CanteenInput, CanteenPatch> {
  constructor(repository: CanteenRepository, patients: PatientRepository) {
    super("Canteen", repository, patients, {
      where: (id) => ({ canteenId: id }),
      detached: { canteenId: null },
    });
  }

  protected override replacement(input: CanteenInput): CanteenPatch {
    return { ...input, location: input.location ?? null };
  }
}

/** Beds are unique per (ward, number). */
export class BedService extends PatientOwnerService<Bed, BedInput, BedPatch> {
  constructor(repository: BedRepository, patients: PatientRepository) {
    super("Bed", repository, patients, {
      where: (id) => ({ bedId: id }),
      detached: { bedId: null },
    });
  }

  override async create(input: BedInput): Promise<Bed> {
    await this.ensurePositionFree(input.ward, input.number, null);
    return super.create(input);
  }

  override async replace(id: string, input: BedInput): Promise<Bed> {
    await this.get(id);
    await this.ensurePositionFree(input.ward, input.number, id);
    return super.replace(id, input);
  }

  override async patch(id: string, patch: BedPatch): Promise<Bed> {
    const current = await this.get(id);
    if (patch.ward !== undefined || patch.number !== undefined) {
      await this.ensurePositionFree(patch.ward ?? current.ward, patch.number ?? current.number, id);
    }
    return super.patch(id, patch);
  }

  private async ensurePositionFree(ward: string, number: number, ownerId: string | null): Promise<void> {
    const taken = await this.repository.findBy({ ward, number });
    if (taken.some((bed) => bed.id !== ownerId)) {
      throw new ConflictError(`Bed ${number} in ward '${ward}' already exists`);
    }
  }
}

export class MedicalLabService extends CrudService<MedicalLab, MedicalLabInput, MedicalLabPatch> {
  constructor(
    repository: MedicalLabRepository,
    private readonly patients: PatientRepository,
  ) {
    super("MedicalLab", repository);
  }

  async patientsOf(id: string): Promise<Patient[]> {
    await this.get(id);
    return this.patients.findByLabId(id);
  }

  override async delete(id: string): Promise<void> {
    await this.get(id);
    for (const patient of await this.patients.findByLabId(id)) {
      await this.patients.update(patient.id, { labIds: patient.labIds.filter((labId) => labId !== id) });
    }
    await super.delete(id);
  }
}

export interface PatientDependencies {
  patients: PatientRepository;
  doctors: DoctorRepository;
  beds: BedRepository;
  canteens: CanteenRepository;
  medicalLabs: MedicalLabRepository;
}

/**
 * Patients validate every association before writing: referenced records
 * must exist and a bed can hold only one patient.
 */
export class PatientService extends CrudService<Patient, PatientInput, PatientPatch> {
  constructor(private readonly deps: PatientDependencies) {
    super("Patient", deps.patients);
  }

  override async create(input: PatientInput): Promise<Patient> {
    return super.create(await this.checkAssociations(input, null));
  }

  override async replace(id: string, input: PatientInput): Promise<Patient> {
    await this.get(id);
    return super.replace(id, await this.checkAssociations(input, id));
  }

  override async patch(id: string, patch: PatientPatch): Promise<Patient> {
    await this.get(id);
    return super.patch(id, await this.checkAssociations(patch, id));
  }

  /** Sends the patient to a lab; a no-op when already assigned. */
  async assignLab(patientId: string, labId: string): Promise<Patient> {
    const patient = await this.get(patientId);
    if (!(await this.deps.medicalLabs.existsById(labId))) throw new NotFoundError("MedicalLab", labId);
    if (patient.labIds.includes(labId)) return patient;
    return this.updateExisting(patientId, { labIds: [...patient.labIds, labId] });
  }

  /** Removes a lab assignment; a no-op when not assigned. */
  async removeLab(patientId: string, labId: string): Promise<Patient> {
    const patient = await this.get(patientId);
    if (!patient.labIds.includes(labId)) return patient;
    return this.updateExisting(patientId, { labIds: patient.labIds.filter((id) => id !== labId) });
  }

  protected override replacement(input: PatientInput): PatientPatch {
    return {
      ...input,
      doctorId: input.doctorId ?? null,
      bedId: input.bedId ?? null,
      canteenId: input.canteenId ?? null,
      labIds: input.labIds ?? [],
    };
  }

  private async checkAssociations<P extends PatientPatch>(changes: P, selfId: string | null): Promise<P> {
    const { doctors, beds, canteens, medicalLabs, patients } = this.deps;
    const issues: ValidationIssue[] = [];

    const references: Array<[keyof PatientPatch, string | null | undefined, string, Existence]> = [
      ["doctorId", changes.doctorId, "Doctor", doctors],
      ["bedId", changes.bedId, "Bed", beds],
      ["canteenId", changes.canteenId, "Canteen", canteens],
    ];
    for (const [field, id, entity, repository] of references) {
      if (id && !(await repository.existsById(id))) {
        issues.push({ path: field, message: `${entity} '${id}' does not exist` });
      }
    }

    const labIds = changes.labIds === undefined ? undefined : [...new Set(changes.labIds)];
    for (const [index, labId] of (labIds ?? []).entries()) {
      if (!(await medicalLabs.existsById(labId))) {
        issues.push({ path: `labIds.${index}`, message: `MedicalLab '${labId}' does not exist` });
      }
    }

    if (issues.length > 0) {
      throw new ValidationError("Patient references records that do not exist", issues);
    }

    if (changes.bedId) {
      const holders = await patients.findBy({ bedId: changes.bedId });
      const other = holders.find((p) => p.id !== selfId);
      if (other) {
        throw new ConflictError(`Bed '${changes.bedId}' is already assigned to patient '${other.id}'`);
      }
    }

    return labIds === undefined ? changes : { ...changes, labIds };
  }
}
