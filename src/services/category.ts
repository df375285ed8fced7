import type Database from "better-sqlite3";
import {
  createCategory,
  deleteCategory,
  listCategoryNames,
  seedCategories,
} from "../db/repository";
import { AlreadyExistsError, ValidationError } from "./errors";
import { MAX_CATEGORY_LENGTH } from "../utils/validator";
import { CategoryScope } from "../types/expense";

export const DEFAULT_CATEGORIES: readonly string[] = [
  "Food",
  "Transport",
  "Housing",
  "Entertainment",
  "Shopping",
  "Health",
  "Other",
];

/**
 * Distinct category names of a scope, in insertion order.
 * An empty scope is seeded with DEFAULT_CATEGORIES on first read.
 */
export async function listCategories(
  db: Database.Database,
  scope: CategoryScope
): Promise<string[]> {
  const names = await listCategoryNames(db, scope);
  if (names.length > 0) return names;

  const seeded = await seedCategories(db, scope, DEFAULT_CATEGORIES);
  if (seeded) {
    console.log(`[Category] Seeded defaults for scope ${scope}`);
  }
  // Another caller may have seeded in between; read back what is stored.
  return listCategoryNames(db, scope);
}

export async function addCategory(
  db: Database.Database,
  scope: CategoryScope,
  rawName: string
): Promise<string> {
  const name = rawName.trim();
  if (!name) {
    throw new ValidationError("Category name cannot be empty");
  }
  if (name.length > MAX_CATEGORY_LENGTH) {
    throw new ValidationError(
      `Category name is limited to ${MAX_CATEGORY_LENGTH} characters`
    );
  }

  const existing = await listCategories(db, scope);
  if (existing.includes(name)) {
    throw new AlreadyExistsError(name);
  }

  await createCategory(db, scope, name);
  return name;
}

/** Idempotent: removing an unknown name deletes nothing. */
export async function removeCategory(
  db: Database.Database,
  scope: CategoryScope,
  name: string
): Promise<number> {
  return deleteCategory(db, scope, name);
}
