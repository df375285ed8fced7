import type Database from "better-sqlite3";
import { StoreUnavailableError } from "../services/errors";
import { CategoryRow, CategoryScope, Expense, NewExpense } from "../types/expense";

/** Storage sentinel for the global category scope. */
const GLOBAL_OWNER_ID = 0;

interface ExpenseRecord {
  id: number;
  user_id: number;
  amount: number;
  category: string;
  occurred_on: string;
  username: string;
}

interface CategoryRecord {
  id: number;
  user_id: number;
  category: string;
}

function ownerId(scope: CategoryScope): number {
  return scope === "global" ? GLOBAL_OWNER_ID : scope;
}

function toScope(userId: number): CategoryScope {
  return userId === GLOBAL_OWNER_ID ? "global" : userId;
}

function toExpense(row: ExpenseRecord): Expense {
  return {
    id: row.id,
    contributorId: row.user_id,
    amount: row.amount,
    category: row.category,
    occurredOn: row.occurred_on,
    displayName: row.username,
  };
}

/**
 * Every store call is its own atomic unit. Driver failures surface as
 * StoreUnavailableError; "no rows" is an empty result, never an error.
 */
async function storeCall<T>(operation: string, fn: () => T): Promise<T> {
  try {
    return fn();
  } catch (error) {
    console.error(`[Store] ${operation} failed:`, error);
    throw new StoreUnavailableError(operation, { cause: error });
  }
}

const EXPENSE_SELECT = `SELECT id, user_id, amount, category, occurred_on, username FROM expenses`;

// ── EXPENSES ──
export async function createExpense(
  db: Database.Database,
  fields: NewExpense
): Promise<number> {
  return storeCall("createExpense", () => {
    const result = db
      .prepare(
        `INSERT INTO expenses (user_id, amount, category, occurred_on, username)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(
        fields.contributorId,
        fields.amount,
        fields.category,
        fields.occurredOn,
        fields.displayName
      );
    return Number(result.lastInsertRowid);
  });
}

/** Newest first. */
export async function listExpenses(db: Database.Database): Promise<Expense[]> {
  return storeCall("listExpenses", () =>
    db
      .prepare<[], ExpenseRecord>(`${EXPENSE_SELECT} ORDER BY id DESC`)
      .all()
      .map(toExpense)
  );
}

/** Newest first, matched on the MM/%/YYYY shape of occurred_on. */
export async function listExpensesIn(
  db: Database.Database,
  month: number,
  year: number
): Promise<Expense[]> {
  const pattern = `${String(month).padStart(2, "0")}/%/${year}`;
  return storeCall("listExpensesIn", () =>
    db
      .prepare<[string], ExpenseRecord>(
        `${EXPENSE_SELECT} WHERE occurred_on LIKE ? ORDER BY id DESC`
      )
      .all(pattern)
      .map(toExpense)
  );
}

/** Returns the number of deleted rows. */
export async function deleteExpenses(
  db: Database.Database,
  scope: "all" | number
): Promise<number> {
  return storeCall("deleteExpenses", () => {
    const result =
      scope === "all"
        ? db.prepare("DELETE FROM expenses").run()
        : db.prepare("DELETE FROM expenses WHERE user_id = ?").run(scope);
    return result.changes;
  });
}

// ── CATEGORIES ──
export async function createCategory(
  db: Database.Database,
  scope: CategoryScope,
  name: string
): Promise<void> {
  await storeCall("createCategory", () =>
    db
      .prepare("INSERT INTO categories (user_id, category) VALUES (?, ?)")
      .run(ownerId(scope), name)
  );
}

export async function deleteCategory(
  db: Database.Database,
  scope: CategoryScope,
  name: string
): Promise<number> {
  return storeCall("deleteCategory", () =>
    db
      .prepare("DELETE FROM categories WHERE user_id = ? AND category = ?")
      .run(ownerId(scope), name).changes
  );
}

/** Raw rows in insertion order, duplicates included. */
export async function listCategoryRows(
  db: Database.Database,
  scope: CategoryScope | "all"
): Promise<CategoryRow[]> {
  return storeCall("listCategoryRows", () => {
    const rows =
      scope === "all"
        ? db
            .prepare<[], CategoryRecord>(
              "SELECT id, user_id, category FROM categories ORDER BY id"
            )
            .all()
        : db
            .prepare<[number], CategoryRecord>(
              "SELECT id, user_id, category FROM categories WHERE user_id = ? ORDER BY id"
            )
            .all(ownerId(scope));
    return rows.map((r) => ({ id: r.id, scope: toScope(r.user_id), name: r.category }));
  });
}

/** Distinct names, ordered by first insertion. */
export async function listCategoryNames(
  db: Database.Database,
  scope: CategoryScope
): Promise<string[]> {
  return storeCall("listCategoryNames", () =>
    db
      .prepare<[number], { category: string }>(
        `SELECT category FROM categories WHERE user_id = ?
         GROUP BY category ORDER BY MIN(id)`
      )
      .all(ownerId(scope))
      .map((r) => r.category)
  );
}

/**
 * Insert `names` only if the scope has no rows yet. Check and insert run
 * in one transaction, so concurrent first reads seed once.
 * Returns true when this call did the seeding.
 */
export async function seedCategories(
  db: Database.Database,
  scope: CategoryScope,
  names: readonly string[]
): Promise<boolean> {
  const owner = ownerId(scope);
  return storeCall("seedCategories", () => {
    const seed = db.transaction(() => {
      const existing = db
        .prepare<[number], { n: number }>(
          "SELECT COUNT(*) AS n FROM categories WHERE user_id = ?"
        )
        .get(owner);
      if (existing && existing.n > 0) return false;

      const insert = db.prepare("INSERT INTO categories (user_id, category) VALUES (?, ?)");
      for (const name of names) {
        insert.run(owner, name);
      }
      return true;
    });
    return seed.immediate();
  });
}
