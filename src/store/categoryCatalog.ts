import fs from "fs";
import { z } from "zod";
import bundledCategories from "../../data/categories.json";
import type { Category, CategoryLookup } from "../types";
import { rateSchema } from "../utils/money";

const categoryRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  defaultUpliftRate: rateSchema,
});

const catalogSchema = z.array(categoryRecordSchema);

export type CategoryRecord = z.input<typeof categoryRecordSchema>;

export interface CategoryCatalog extends CategoryLookup {
  findCategory(categoryId: string): Category | undefined;
  list(): Category[];
}

export function createCategoryCatalog(records: readonly CategoryRecord[]): CategoryCatalog {
  const byId = new Map<string, Category>();
  for (const category of catalogSchema.parse(records)) {
    if (byId.has(category.id)) {
      throw new Error(`Duplicate category id: ${category.id}`);
    }
    byId.set(category.id, Object.freeze(category));
  }

  return {
    findCategory: (categoryId) => byId.get(categoryId),
    list: () => [...byId.values()],
  };
}

/** Reads a JSON array of { id, name, defaultUpliftRate } records. */
export function loadCategoryCatalog(filePath: string): CategoryCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return createCategoryCatalog(catalogSchema.parse(raw));
}

/** The catalog named by FINANCE_CATEGORIES_FILE, else the bundled one. */
export function defaultCategoryCatalog(env: Record<string, string | undefined> = process.env): CategoryCatalog {
  const file = env.FINANCE_CATEGORIES_FILE?.trim();
  return file ? loadCategoryCatalog(file) : createCategoryCatalog(bundledCategories);
}
