/**
 * Report Commands
 *
 * /report, /month MM/YYYY and /prev_month. Read-only: each command makes
 * one store query, builds the report and sends its segments in order,
 * then the summary.
 */

import { Context } from "grammy";
import { Env } from "../config/env";
import { listExpenses, listExpensesIn } from "../db/repository";
import { buildMonthReport, buildOverviewReport } from "../services/report";
import { replyFailure } from "./failure";
import { formatMonthKey, monthLabel, parseMonthArg, previousMonth } from "../utils/date";
import { Report } from "../types/expense";

export const MONTH_USAGE = "Use the format: /month MM/YYYY (e.g. /month 04/2025)";
export const MONTH_INVALID = "Invalid format. Use: /month MM/YYYY";

async function sendReport(ctx: Context, report: Report) {
  for (const message of [...report.segments, ...report.summary]) {
    await ctx.reply(message, { parse_mode: "HTML" });
  }
}

export async function handleReport(ctx: Context, env: Env): Promise<void> {
  try {
    console.log(`[Cmd] /report from user ${ctx.from?.id}`);

    const records = await listExpenses(env.DB);
    if (records.length === 0) {
      await ctx.reply("No records yet. Try adding expenses with /add!");
      return;
    }

    const report = buildOverviewReport(
      records,
      env.CLOCK.today(),
      env.REPORT_LAYOUT,
      env.REPORT_CHUNK_SIZE
    );
    await sendReport(ctx, report);
  } catch (error) {
    await replyFailure(ctx, "/report", error);
  }
}

export async function handleMonth(ctx: Context, env: Env): Promise<void> {
  const args = (typeof ctx.match === "string" ? ctx.match : "")
    .split(/\s+/)
    .filter(Boolean);

  if (args.length !== 1) {
    await ctx.reply(MONTH_USAGE);
    return;
  }

  const ref = parseMonthArg(args[0]);
  if (!ref) {
    await ctx.reply(MONTH_INVALID);
    return;
  }

  try {
    console.log(`[Cmd] /month ${formatMonthKey(ref)} from user ${ctx.from?.id}`);

    const records = await listExpensesIn(env.DB, ref.month, ref.year);
    if (records.length === 0) {
      await ctx.reply(`No expenses found for ${formatMonthKey(ref)}.`);
      return;
    }

    await sendReport(ctx, buildMonthReport(records, ref, env.REPORT_CHUNK_SIZE));
  } catch (error) {
    await replyFailure(ctx, "/month", error);
  }
}

export async function handlePrevMonth(ctx: Context, env: Env): Promise<void> {
  const today = env.CLOCK.today();
  const ref = previousMonth({ month: today.month, year: today.year });

  try {
    console.log(`[Cmd] /prev_month (${formatMonthKey(ref)}) from user ${ctx.from?.id}`);

    const records = await listExpensesIn(env.DB, ref.month, ref.year);
    if (records.length === 0) {
      await ctx.reply(`No expenses found for ${monthLabel(ref)}.`);
      return;
    }

    await sendReport(
      ctx,
      buildMonthReport(records, ref, env.REPORT_CHUNK_SIZE, "📅 Detailed report for")
    );
  } catch (error) {
    await replyFailure(ctx, "/prev_month", error);
  }
}
