import { describe, it, expect, beforeEach } from "vitest";
import { ConflictError, ValidationError } from "../../errors/app-error.js";
import type { Product, ProductInput, ProductPatch } from "../../models/product.js";
import { InMemoryPatientRepository } from "../../repositories/hospital.js";
import { InMemoryRepository } from "../../repositories/memory-repository.js";
import { buildProduct, createInMemoryProductRepository } from "../../repositories/products.js";
import { sequentialIds } from "../helpers/db.js";

describe("InMemoryRepository", () => {
  let repo: InMemoryRepository<Product, ProductInput, ProductPatch>;

  beforeEach(() => {
    repo = new InMemoryRepository<Product, ProductInput, ProductPatch>(
      { entity: "Product", prefix: "prd", fields: ["name", "price", "description"] },
      buildProduct,
      sequentialIds(),
    );
  });

  async function seed(...items: Array<[string, number]>): Promise<Product[]> {
    const created: Product[] = [];
    for (const [name, price] of items) created.push(await repo.create({ name, price }));
    return created;
  }

  it("creates records with generated metadata", async () => {
    const lamp = await repo.create({ name: "Lamp", price: 10 });

    expect(lamp).toMatchObject({ id: "prd_1", name: "Lamp", price: 10, description: null });
    expect(lamp.createdAt).toBe(lamp.updatedAt);
    expect(await repo.findById("prd_1")).toEqual(lamp);
    expect(await repo.findById("prd_404")).toBeNull();
  });

  it("generates prefixed nanoid ids by default", async () => {
    const product = await createInMemoryProductRepository().create({ name: "Lamp", price: 10 });
    expect(product.id).toMatch(/^prd_[A-Za-z0-9_-]{16}$/);
  });

  it("lists in insertion order by default", async () => {
    await seed(["Desk", 120], ["Lamp", 10], ["Chair", 45]);
    const page = await repo.findAll();
    expect(page.items.map((p) => p.name)).toEqual(["Desk", "Lamp", "Chair"]);
    expect(page).toMatchObject({ page: 1, size: 20, total: 3, totalPages: 1 });
  });

  it("sorts with ties kept in insertion order", async () => {
    await seed(["A", 5], ["B", 3], ["C", 5]);

    const asc = await repo.findAll({ sort: { field: "price", direction: "asc" } });
    expect(asc.items.map((p) => p.name)).toEqual(["B", "A", "C"]);

    const desc = await repo.findAll({ sort: { field: "price", direction: "desc" } });
    expect(desc.items.map((p) => p.name)).toEqual(["A", "C", "B"]);
  });

  it("pages through the results", async () => {
    await seed(["A", 1], ["B", 2], ["C", 3], ["D", 4], ["E", 5]);
    const page = await repo.findAll({ page: 3, size: 2 });
    expect(page.items.map((p) => p.name)).toEqual(["E"]);
    expect(page).toMatchObject({ page: 3, size: 2, total: 5, totalPages: 3 });
  });

  it("searches case-insensitively", async () => {
    await seed(["Desk lamp", 30], ["Chair", 45], ["LAMP shade", 12]);
    const page = await repo.findAll({ search: { field: "name", term: "lAmP" } });
    expect(page.items.map((p) => p.name)).toEqual(["Desk lamp", "LAMP shade"]);
    expect(page.total).toBe(2);
  });

  it("filters by equality, including null", async () => {
    await repo.create({ name: "Lamp", price: 10, description: "Warm light" });
    await repo.create({ name: "Desk", price: 10 });
    expect((await repo.findBy({ description: null })).map((p) => p.name)).toEqual(["Desk"]);
    expect((await repo.findBy({ price: 10, name: "Lamp" })).map((p) => p.id)).toEqual(["prd_1"]);
  });

  it("updates in place, keeping id and creation time", async () => {
    const [lamp] = await seed(["Lamp", 10]);
    const updated = await repo.update("prd_1", { price: 12, name: undefined });

    expect(updated).toMatchObject({ id: "prd_1", name: "Lamp", price: 12, createdAt: lamp?.createdAt });
    expect(await repo.update("prd_404", { price: 1 })).toBeNull();
  });

  it("hands out copies of the stored records", async () => {
    const created = await repo.create({ name: "Lamp", price: 10 });
    created.name = "Changed";

    const found = await repo.findById("prd_1");
    if (found) found.price = 99;
    const [listed] = (await repo.findAll()).items;
    if (listed) listed.description = "changed";

    expect(await repo.findById("prd_1")).toMatchObject({ name: "Lamp", price: 10, description: null });
  });

  it("deletes and counts", async () => {
    await seed(["Lamp", 10], ["Desk", 120]);
    expect(await repo.deleteById("prd_1")).toBe(true);
    expect(await repo.deleteById("prd_1")).toBe(false);
    expect(await repo.existsById("prd_1")).toBe(false);
    expect(await repo.existsById("prd_2")).toBe(true);
    expect(await repo.count()).toBe(1);
  });
});

describe("InMemoryPatientRepository", () => {
  it("collapses duplicate lab ids and finds patients by lab", async () => {
    const repo = new InMemoryPatientRepository();
    const bo = await repo.create({ name: "Bo", age: 40, labIds: ["lab_1", "lab_2", "lab_1"] });
    await repo.create({ name: "Cy", age: 22, labIds: ["lab_2"] });

    expect(bo.labIds).toEqual(["lab_1", "lab_2"]);
    expect((await repo.findByLabId("lab_2")).map((p) => p.name)).toEqual(["Bo", "Cy"]);
    expect(await repo.findByLabId("lab_3")).toEqual([]);
  });

  it("refuses to filter on the lab list", async () => {
    const repo = new InMemoryPatientRepository();
    await expect(repo.findBy({ labIds: ["lab_1"] })).rejects.toThrow(ValidationError);
    await expect(repo.findBy({ labIds: ["lab_1"] })).rejects.toThrow("Cannot filter Patient by 'labIds'");
  });

  it("rejects sorting and searching on fields outside the mapping", async () => {
    const repo = new InMemoryPatientRepository();
    await repo.create({ name: "Bo", age: 40, labIds: ["lab_1"] });

    await expect(repo.findAll({ sort: { field: "labIds", direction: "asc" } })).rejects.toMatchObject({
      message: "Cannot sort Patient by 'labIds'",
      issues: [{ path: "labIds", message: "not a sortable field" }],
    });
    await expect(repo.findAll({ search: { field: "labIds", term: "lab" } })).rejects.toThrow(
      "Cannot filter Patient by 'labIds'",
    );
  });

  it("keeps a returned lab list detached from the stored one", async () => {
    const repo = new InMemoryPatientRepository();
    const bo = await repo.create({ name: "Bo", age: 40, labIds: ["lab_1"] });

    bo.labIds.push("lab_2");
    (await repo.findByLabId("lab_1"))[0]?.labIds.push("lab_3");

    expect((await repo.findById(bo.id))?.labIds).toEqual(["lab_1"]);
  });

  it("allows one patient per bed, even for concurrent writes", async () => {
    const repo = new InMemoryPatientRepository();
    const results = await Promise.allSettled([
      repo.create({ name: "Bo", age: 40, bedId: "bed_1" }),
      repo.create({ name: "Cy", age: 22, bedId: "bed_1" }),
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    const [, second] = results;
    expect(second?.status === "rejected" && second.reason).toBeInstanceOf(ConflictError);
    expect(await repo.count()).toBe(1);

    await repo.create({ name: "Di", age: 31 });
    await repo.create({ name: "Ed", age: 55 });
    expect(await repo.count()).toBe(3);
  });

  it("rejects moving a patient into an occupied bed", async () => {
    const repo = new InMemoryPatientRepository();
    await repo.create({ name: "Bo", age: 40, bedId: "bed_1" });
    const cy = await repo.create({ name: "Cy", age: 22, bedId: "bed_2" });

    await expect(repo.update(cy.id, { bedId: "bed_1" })).rejects.toThrow("Patient already exists (bedId)");
    expect(await repo.update(cy.id, { bedId: "bed_2", age: 23 })).toMatchObject({ bedId: "bed_2", age: 23 });
  });
});
