import type { Database } from "better-sqlite3";
import type { ProductRow } from "../db/schema.js";
import type { Product, ProductInput, ProductPatch } from "../models/product.js";
import { InMemoryRepository, type RecordBuilder } from "./memory-repository.js";
import type { CrudRepository } from "./repository.js";
import { SqliteRepository } from "./sqlite-repository.js";

export type ProductRepository = CrudRepository<Product, ProductInput, ProductPatch>;

export class SqliteProductRepository
  extends SqliteRepository<Product, ProductInput, ProductPatch, ProductRow>
  implements ProductRepository
{
  constructor(db: Database) {
    super(db, {
      entity: "Product",
      table: "products",
      prefix: "prd",
      columns: { name: "name", price: "price", description: "description" },
    });
  }

  protected toEntity(row: ProductRow): Product {
    return {
      id: row.id,
      name: row.name,
      price: row.price,
      description: row.description,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

export const buildProduct: RecordBuilder<Product, ProductInput> = (input, meta) => ({
  ...meta,
  name: input.name,
  price: input.price,
  description: input.description ?? null,
});

export function createInMemoryProductRepository(): ProductRepository {
  return new InMemoryRepository<Product, ProductInput, ProductPatch>(
    { entity: "Product", prefix: "prd", fields: ["name", "price", "description"] },
    buildProduct,
  );
}
