import { CalendarDate, MonthRef } from "../types/expense";

export const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

export interface Clock {
  today(): CalendarDate;
}

/**
 * Clock pinned to a fixed UTC offset, so stamped dates do not depend on
 * the host's timezone.
 */
export function createClock(
  utcOffsetHours: number,
  now: () => Date = () => new Date()
): Clock {
  return {
    today() {
      const shifted = new Date(now().getTime() + utcOffsetHours * 60 * 60 * 1000);
      return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
      };
    },
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function daysInMonth(month: number, year: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Format to MM/DD/YYYY, the storage and display format of expense dates.
 */
export function formatDisplayDate(d: CalendarDate): string {
  return `${pad2(d.month)}/${pad2(d.day)}/${d.year}`;
}

/** MM/YYYY, the month bucket key. */
export function formatMonthKey(ref: MonthRef): string {
  return `${pad2(ref.month)}/${ref.year}`;
}

export function monthLabel(ref: MonthRef): string {
  return `${MONTH_NAMES[ref.month - 1] ?? String(ref.month)} ${ref.year}`;
}

/**
 * Parse MM/DD/YYYY. Returns null for anything that is not a real date.
 */
export function parseDisplayDate(text: string): CalendarDate | null {
  const m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!m) return null;

  const month = parseInt(m[1], 10);
  const day = parseInt(m[2], 10);
  const year = parseInt(m[3], 10);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(month, year)) return null;

  return { year, month, day };
}

/**
 * Parse the /month argument (MM/YYYY). Month must be 1-12.
 */
export function parseMonthArg(text: string): MonthRef | null {
  const m = /^(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!m) return null;

  const month = parseInt(m[1], 10);
  const year = parseInt(m[2], 10);
  if (month < 1 || month > 12) return null;

  return { month, year };
}

/** January rolls back to December of the previous year. */
export function previousMonth(ref: MonthRef): MonthRef {
  if (ref.month === 1) return { month: 12, year: ref.year - 1 };
  return { month: ref.month - 1, year: ref.year };
}

export function compareMonths(a: MonthRef, b: MonthRef): number {
  return a.year - b.year || a.month - b.month;
}
