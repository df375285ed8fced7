/**
 * Report Builder
 *
 * One report core for every command: records in, ordered message
 * segments plus a closing summary out. The /report layout is selectable
 * (current month only, or every month bucket); /month and /prev_month use
 * the detailed month layout.
 */

import {
  groupByCategory,
  groupByContributor,
  groupByMonth,
  recordsInMonth,
  totalOf,
  totalsForPeriod,
  totalsForYear,
} from "./aggregation";
import { assertNever } from "../utils/assert";
import { chunkLines } from "../utils/chunk";
import { monthLabel, previousMonth } from "../utils/date";
import { formatAmount, formatBucketLine, formatExpenseLine } from "../utils/formatter";
import { CalendarDate, Expense, MonthRef, Report, ReportLayout } from "../types/expense";

const OVERVIEW_TITLE = "Your expenses:\n\n";

function monthSection(
  records: readonly Expense[],
  label: string,
  title: string,
  maxLength: number
): string[] {
  return chunkLines(
    `${title}== ${label} ==\n`,
    `== ${label} (continued) ==\n`,
    records.map(formatExpenseLine),
    maxLength
  );
}

function overviewSummary(records: readonly Expense[], today: CalendarDate): string[] {
  const current: MonthRef = { month: today.month, year: today.year };
  const previous = previousMonth(current);

  const summary = [
    "📊 SUMMARY:",
    "",
    `💰 Expenses for ${monthLabel(previous)}: ${formatAmount(totalsForPeriod(records, previous.month, previous.year))}`,
    `💰 Expenses for ${monthLabel(current)}: ${formatAmount(totalsForPeriod(records, current.month, current.year))}`,
    `💰 Total expenses for ${current.year}: ${formatAmount(totalsForYear(records, current.year))}`,
  ].join("\n");
  return [summary];
}

/**
 * /report. Records are expected newest first, as the store returns them.
 */
export function buildOverviewReport(
  records: readonly Expense[],
  today: CalendarDate,
  layout: ReportLayout,
  maxLength: number
): Report {
  const summary = overviewSummary(records, today);

  switch (layout) {
    case "current_month": {
      const current: MonthRef = { month: today.month, year: today.year };
      const label = monthLabel(current);
      const inMonth = recordsInMonth(records, current);

      const segments =
        inMonth.length > 0
          ? monthSection(inMonth, label, OVERVIEW_TITLE, maxLength)
          : [`${OVERVIEW_TITLE}No expenses found for ${label}.`];
      return { segments, summary };
    }

    case "by_month": {
      const segments = groupByMonth(records).flatMap((bucket, i) =>
        monthSection(bucket.expenses, bucket.label, i === 0 ? OVERVIEW_TITLE : "", maxLength)
      );
      return { segments, summary };
    }

    default:
      return assertNever(layout);
  }
}

/**
 * /month and /prev_month: every record of one month, then totals per
 * category and per contributor. The totals are paged like the records,
 * since the number of categories is unbounded.
 */
export function buildMonthReport(
  records: readonly Expense[],
  month: MonthRef,
  maxLength: number,
  title = "Report for"
): Report {
  const label = monthLabel(month);
  const segments = chunkLines(
    `${title} ${label}:\n\n`,
    `${title} ${label} (continued):\n\n`,
    records.map(formatExpenseLine),
    maxLength
  );

  const lines = ["📊 By category:"];
  for (const bucket of groupByCategory(records)) {
    lines.push(formatBucketLine(bucket));
  }
  lines.push("");
  lines.push("👥 By contributor:");
  for (const bucket of groupByContributor(records)) {
    lines.push(formatBucketLine(bucket, "@"));
  }

  const summary = chunkLines(
    `💰 Total for ${label}: ${formatAmount(totalOf(records))}\n\n`,
    `Totals for ${label} (continued):\n\n`,
    lines,
    maxLength
  );
  return { segments, summary };
}
