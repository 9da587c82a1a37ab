import type { Repositories } from "../repositories/index.js";
import { ProductService, StudentService, UserService } from "./catalog.js";
import { BedService, CanteenService, DoctorService, MedicalLabService, PatientService } from "./hospital.js";

export interface Services {
  products: ProductService;
  students: StudentService;
  users: UserService;
  doctors: DoctorService;
  beds: BedService;
  canteens: CanteenService;
  medicalLabs: MedicalLabService;
  patients: PatientService;
}

export function createServices(repos: Repositories): Services {
  return {
    products: new ProductService(repos.products),
    students: new StudentService(repos.students),
    users: new UserService(repos.users),
    doctors: new DoctorService(repos.doctors, repos.patients),
    beds: new BedService(repos.beds, repos.patients),
    canteens: new CanteenService(repos.canteens, repos.patients),
    medicalLabs: new MedicalLabService(repos.medicalLabs, repos.patients),
    patients: new PatientService(repos),
  };
}
