// ── Calendar ──
export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export interface MonthRef {
  month: number; // 1-12
  year: number;
}

// ── Expense ──
export interface Expense {
  id: number;
  contributorId: number;
  amount: number;
  category: string;
  /** MM/DD/YYYY, as stored */
  occurredOn: string;
  displayName: string;
}

export type NewExpense = Omit<Expense, "id">;

// ── Category ──
/** "global" is the list shared by every contributor. */
export type CategoryScope = "global" | number;

export interface CategoryRow {
  id: number;
  scope: CategoryScope;
  name: string;
}

// ── Reports ──
export type ReportLayout = "current_month" | "by_month";

export interface Bucket {
  key: string;
  label: string;
  expenses: Expense[];
  total: number;
}

export interface Report {
  segments: string[];
  /** Sent after the segments, each part bounded like a segment */
  summary: string[];
}
