import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  DEFAULT_CATEGORIES,
  addCategory,
  listCategories,
  removeCategory,
} from "../../src/services/category";
import { listCategoryRows } from "../../src/db/repository";
import { AlreadyExistsError, ValidationError } from "../../src/services/errors";
import { createTestDb } from "../helpers/db";

describe("category registry", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it("seeds the defaults on first read of an empty scope", async () => {
    expect(await listCategories(db, "global")).toEqual([...DEFAULT_CATEGORIES]);
    expect(await listCategoryRows(db, "global")).toHaveLength(DEFAULT_CATEGORIES.length);
  });

  it("seeds only once", async () => {
    await listCategories(db, "global");
    await listCategories(db, "global");

    expect(await listCategoryRows(db, "all")).toHaveLength(DEFAULT_CATEGORIES.length);
  });

  it("seeds each scope independently", async () => {
    await listCategories(db, "global");
    await addCategory(db, "global", "Pets");

    expect(await listCategories(db, 42)).toEqual([...DEFAULT_CATEGORIES]);
    expect(await listCategories(db, "global")).toEqual([...DEFAULT_CATEGORIES, "Pets"]);
  });

  it("adds a trimmed name at the end", async () => {
    expect(await addCategory(db, "global", "  Pets  ")).toBe("Pets");
    expect((await listCategories(db, "global")).at(-1)).toBe("Pets");
  });

  it("rejects an empty name", async () => {
    await expect(addCategory(db, "global", "   ")).rejects.toThrow(ValidationError);
  });

  it("rejects a name over the length limit", async () => {
    await expect(addCategory(db, "global", "x".repeat(49))).rejects.toThrow(ValidationError);
    await expect(addCategory(db, "global", "x".repeat(48))).resolves.toBe("x".repeat(48));
  });

  it("rejects a duplicate with AlreadyExistsError", async () => {
    const err = await addCategory(db, "global", "Food").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AlreadyExistsError);
    expect(err).toMatchObject({ value: "Food" });
  });

  it("treats names case-sensitively", async () => {
    await expect(addCategory(db, "global", "food")).resolves.toBe("food");
  });

  it("removes a name and is idempotent", async () => {
    await listCategories(db, "global");

    expect(await removeCategory(db, "global", "Food")).toBe(1);
    expect(await removeCategory(db, "global", "Food")).toBe(0);
    expect(await listCategories(db, "global")).not.toContain("Food");
  });

  it("reseeds after the last category is removed", async () => {
    await listCategories(db, "global");
    for (const name of DEFAULT_CATEGORIES) {
      await removeCategory(db, "global", name);
    }

    expect(await listCategories(db, "global")).toEqual([...DEFAULT_CATEGORIES]);
  });
});
