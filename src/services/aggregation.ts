import { Bucket, Expense, MonthRef } from "../types/expense";
import { addAmounts } from "../utils/validator";
import { compareMonths, formatMonthKey, monthLabel, parseDisplayDate } from "../utils/date";

export const UNKNOWN_MONTH_KEY = "unknown";

export interface MonthBucket extends Bucket {
  /** null for the bucket of unparseable dates */
  month: MonthRef | null;
}

function sumAmounts(records: readonly Expense[]): number {
  return records.reduce((total, r) => addAmounts(total, r.amount), 0);
}

/** Sum of the records dated in the given month. 0 when none match. */
export function totalsForPeriod(
  records: readonly Expense[],
  month: number,
  year: number
): number {
  return sumAmounts(
    records.filter((r) => {
      const date = parseDisplayDate(r.occurredOn);
      return date !== null && date.month === month && date.year === year;
    })
  );
}

export function totalsForYear(records: readonly Expense[], year: number): number {
  return sumAmounts(records.filter((r) => parseDisplayDate(r.occurredOn)?.year === year));
}

export function recordsInMonth(records: readonly Expense[], ref: MonthRef): Expense[] {
  return records.filter((r) => {
    const date = parseDisplayDate(r.occurredOn);
    return date !== null && compareMonths(date, ref) === 0;
  });
}

/**
 * Partition by MM/YYYY. Unparseable dates land in one "unknown" bucket.
 * Buckets come back ordered by (year, month) ascending, unknown last;
 * records keep their input order inside a bucket.
 */
export function groupByMonth(records: readonly Expense[]): MonthBucket[] {
  const buckets = new Map<string, MonthBucket>();

  for (const record of records) {
    const date = parseDisplayDate(record.occurredOn);
    const month = date ? { month: date.month, year: date.year } : null;
    const key = month ? formatMonthKey(month) : UNKNOWN_MONTH_KEY;

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        key,
        label: month ? monthLabel(month) : "Unknown date",
        month,
        expenses: [],
        total: 0,
      };
      buckets.set(key, bucket);
    }
    bucket.expenses.push(record);
    bucket.total = addAmounts(bucket.total, record.amount);
  }

  return [...buckets.values()].sort((a, b) => {
    if (!a.month) return b.month ? 1 : 0;
    if (!b.month) return -1;
    return compareMonths(a.month, b.month);
  });
}

function groupBy(
  records: readonly Expense[],
  keyOf: (r: Expense) => string,
  labelOf: (r: Expense) => string
): Bucket[] {
  const buckets = new Map<string, Bucket>();

  for (const record of records) {
    const key = keyOf(record);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = { key, label: labelOf(record), expenses: [], total: 0 };
      buckets.set(key, bucket);
    }
    bucket.expenses.push(record);
    bucket.total = addAmounts(bucket.total, record.amount);
  }

  // Map iteration order = first occurrence
  return [...buckets.values()];
}

export function groupByCategory(records: readonly Expense[]): Bucket[] {
  return groupBy(records, (r) => r.category, (r) => r.category);
}

/** Keyed by contributor id, labelled with the first display name seen. */
export function groupByContributor(records: readonly Expense[]): Bucket[] {
  return groupBy(records, (r) => String(r.contributorId), (r) => r.displayName);
}

export function totalOf(records: readonly Expense[]): number {
  return sumAmounts(records);
}
