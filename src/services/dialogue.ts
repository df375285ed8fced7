import type Database from "better-sqlite3";
import { createExpense, deleteExpenses } from "../db/repository";
import { addCategory, listCategories, removeCategory } from "./category";
import { AlreadyExistsError, SessionExpiredError, ValidationError } from "./errors";
import { Flow, FlowKind, SessionStore } from "./session";
import { assertNever } from "../utils/assert";
import { formatDisplayDate } from "../utils/date";
import type { Choice } from "../utils/keyboard";
import { MAX_AMOUNT, parseAmount } from "../utils/validator";
import { CalendarDate, Expense } from "../types/expense";

/** Which step a free-text message belongs to, if any. */
export type TextStep = "expense_amount" | "expense_category" | "category_name";

/** Options shown on a keyboard, and the nonce its buttons carry. */
export interface ChoicePrompt {
  options: string[];
  nonce: string;
}

/**
 * Run a commit against a taken session. When the commit throws, the
 * session goes back so the contributor can retry the same step.
 */
async function commitWith<T>(
  sessions: SessionStore,
  contributorId: number,
  flow: Flow,
  commit: () => Promise<T>
): Promise<T> {
  try {
    return await commit();
  } catch (error) {
    sessions.restore(contributorId, flow);
    throw error;
  }
}

function pickOption(options: readonly string[], index: number): string | null {
  return Number.isInteger(index) && index >= 0 && index < options.length
    ? options[index]
    : null;
}

// ── EXPENSE ENTRY: amount → category → saved ──

/** Re-entry discards an unfinished entry without complaint. */
export function beginExpenseEntry(sessions: SessionStore, contributorId: number): void {
  sessions.set(contributorId, { kind: "expense", step: "awaiting_amount" });
}

export async function submitAmount(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number,
  text: string
): Promise<ChoicePrompt & { amount: number }> {
  const session = sessions.get(contributorId, "expense");
  if (!session || session.step !== "awaiting_amount") {
    throw new SessionExpiredError("expense");
  }

  const amount = parseAmount(text);
  if (amount === null) {
    // Same step, fresh idle timer
    sessions.set(contributorId, session);
    throw new ValidationError(
      `Amount must be a positive number up to ${MAX_AMOUNT}`
    );
  }

  const options = await listCategories(db, "global");

  // Cancelled or restarted while the categories were loading
  if (sessions.get(contributorId, "expense") !== session) {
    throw new SessionExpiredError("expense");
  }

  const nonce = sessions.issueNonce();
  sessions.set(contributorId, {
    kind: "expense",
    step: "awaiting_category",
    amount,
    options,
    nonce,
  });
  return { amount, options, nonce };
}

export async function selectCategory(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number,
  choice: Choice,
  displayName: string,
  today: CalendarDate
): Promise<Expense> {
  const session = sessions.take(contributorId, "expense");
  if (!session) {
    throw new SessionExpiredError("expense");
  }

  switch (session.step) {
    case "awaiting_amount":
      sessions.restore(contributorId, session);
      throw new SessionExpiredError("expense");

    case "awaiting_category": {
      // A button from an older keyboard
      if (choice.nonce !== session.nonce) {
        sessions.restore(contributorId, session);
        throw new SessionExpiredError("expense");
      }

      const category = pickOption(session.options, choice.index);
      if (category === null) {
        sessions.restore(contributorId, session);
        throw new ValidationError("Unknown category choice");
      }

      const fields = {
        contributorId,
        amount: session.amount,
        category,
        occurredOn: formatDisplayDate(today),
        displayName,
      };
      const id = await commitWith(sessions, contributorId, session, () =>
        createExpense(db, fields)
      );

      console.log(
        `[Dialogue] Expense #${id} saved for ${contributorId}: ${fields.amount} ${category}`
      );
      return { id, ...fields };
    }

    default:
      return assertNever(session);
  }
}

// ── ADD CATEGORY: name → saved ──

export function beginCategoryEntry(sessions: SessionStore, contributorId: number): void {
  sessions.set(contributorId, { kind: "add_category", step: "awaiting_name" });
}

/**
 * A ValidationError keeps the prompt open; a duplicate name ends the flow.
 */
export async function submitCategoryName(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number,
  text: string
): Promise<string> {
  const session = sessions.get(contributorId, "add_category");
  if (!session) {
    throw new SessionExpiredError("add_category");
  }

  try {
    const name = await addCategory(db, "global", text);
    sessions.delete(contributorId, "add_category");
    return name;
  } catch (error) {
    if (error instanceof AlreadyExistsError) {
      sessions.delete(contributorId, "add_category");
    }
    throw error;
  }
}

// ── DELETE CATEGORY: selection → removed ──

export async function beginCategoryDeletion(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number
): Promise<ChoicePrompt | null> {
  const options = await listCategories(db, "global");
  if (options.length === 0) return null;

  const nonce = sessions.issueNonce();
  sessions.set(contributorId, {
    kind: "delete_category",
    step: "awaiting_selection",
    options,
    nonce,
  });
  return { options, nonce };
}

export async function confirmCategoryDeletion(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number,
  choice: Choice
): Promise<string> {
  const session = sessions.take(contributorId, "delete_category");
  if (!session) {
    throw new SessionExpiredError("delete_category");
  }
  if (choice.nonce !== session.nonce) {
    sessions.restore(contributorId, session);
    throw new SessionExpiredError("delete_category");
  }

  const name = pickOption(session.options, choice.index);
  if (name === null) {
    sessions.restore(contributorId, session);
    throw new ValidationError("Unknown category choice");
  }

  const removed = await commitWith(sessions, contributorId, session, () =>
    removeCategory(db, "global", name)
  );
  console.log(`[Dialogue] Category "${name}" removed by ${contributorId} (${removed} row(s))`);
  return name;
}

// ── CLEAR EXPENSES: /clear → /confirmclear ──

export function requestClear(
  sessions: SessionStore,
  contributorId: number,
  windowSeconds: number
): void {
  sessions.set(
    contributorId,
    { kind: "clear_expenses", step: "awaiting_confirmation" },
    windowSeconds
  );
}

/** Deletes every expense of every contributor. Returns the row count. */
export async function confirmClear(
  db: Database.Database,
  sessions: SessionStore,
  contributorId: number
): Promise<number> {
  const session = sessions.take(contributorId, "clear_expenses");
  if (!session) {
    throw new SessionExpiredError("clear_expenses");
  }

  const deleted = await commitWith(sessions, contributorId, session, () =>
    deleteExpenses(db, "all")
  );
  console.warn(`[Dialogue] All expenses cleared by ${contributorId} (${deleted} row(s))`);
  return deleted;
}

// ── SHARED ──

/** Abort every flow of the contributor. Never fails. */
export function cancel(sessions: SessionStore, contributorId: number): FlowKind[] {
  return sessions.clear(contributorId);
}

/**
 * A pending amount takes the text first. An expense waiting on its
 * category button only takes buttons, so a category name gets through.
 */
export function activeTextFlow(sessions: SessionStore, contributorId: number): TextStep | null {
  const expense = sessions.get(contributorId, "expense");
  const naming = sessions.get(contributorId, "add_category") !== null;
  if (!expense) return naming ? "category_name" : null;

  switch (expense.step) {
    case "awaiting_amount":
      return "expense_amount";
    case "awaiting_category":
      return naming ? "category_name" : "expense_category";
    default:
      return assertNever(expense);
  }
}
