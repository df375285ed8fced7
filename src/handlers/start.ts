import { Context } from "grammy";
import { Env } from "../config/env";
import { listCategories } from "../services/category";
import { displayNameOf, replyFailure } from "./failure";
import { escapeHtml } from "../utils/validator";

export interface CommandInfo {
  command: string;
  description: string;
  usage?: string;
}

/** Published with setMyCommands and rendered by /help. */
export const COMMANDS: readonly CommandInfo[] = [
  { command: "start", description: "Start working with the bot" },
  { command: "help", description: "Show the command list" },
  { command: "add", description: "Record a new expense" },
  { command: "report", description: "Spending report for the current month" },
  { command: "prev_month", description: "Detailed report for the previous month" },
  { command: "month", description: "Report for a given month", usage: "MM/YYYY" },
  { command: "clear", description: "Delete every recorded expense" },
  { command: "categories", description: "List categories" },
  { command: "add_category", description: "Add a category" },
  { command: "delete_category", description: "Delete a category" },
  { command: "cancel", description: "Cancel the current operation" },
];

export function helpText(): string {
  const lines = ["<b>Available commands:</b>"];
  for (const c of COMMANDS) {
    const usage = c.usage ? ` ${c.usage}` : "";
    lines.push(`/${c.command}${usage} - ${c.description}`);
  }
  return lines.join("\n");
}

export async function handleStart(ctx: Context, env: Env) {
  if (!ctx.from) return;

  try {
    // Make sure the shared category list exists before the first /add
    await listCategories(env.DB, "global");
  } catch (error) {
    await replyFailure(ctx, "/start", error);
    return;
  }

  const name = escapeHtml(displayNameOf(ctx.from));
  await ctx.reply(
    `👋 <b>Hi ${name}!</b> I keep track of shared expenses.\n\n` +
      "Use /add to record an expense or /help to see every command.",
    { parse_mode: "HTML" }
  );
}

export async function handleHelp(ctx: Context) {
  await ctx.reply(helpText(), { parse_mode: "HTML" });
}
