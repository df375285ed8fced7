import { Bucket, Expense } from "../types/expense";
import { escapeHtml } from "./validator";

export function formatAmount(amount: number): string {
  return `${amount.toFixed(2)}$`;
}

/** 04/15/2025: 12.50$ — Food (added by: @alice) */
export function formatExpenseLine(e: Expense): string {
  return `${e.occurredOn}: ${formatAmount(e.amount)} — ${escapeHtml(e.category)} (added by: @${escapeHtml(e.displayName)})`;
}

export function formatBucketLine(b: Bucket, prefix = ""): string {
  return `• ${prefix}${escapeHtml(b.label)}: ${formatAmount(b.total)}`;
}

export function formatCategoryList(categories: readonly string[]): string {
  const lines = ["<b>Available categories:</b>", ""];
  categories.forEach((c, i) => lines.push(`${i + 1}. ${escapeHtml(c)}`));
  lines.push("");
  lines.push("Use /add_category to add one or /delete_category to remove one.");
  return lines.join("\n");
}

export function formatSaved(e: Expense): string {
  return `✅ Saved: ${formatAmount(e.amount)} — ${escapeHtml(e.category)}`;
}
