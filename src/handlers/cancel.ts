import { Context } from "grammy";
import { Env } from "../config/env";
import { cancel } from "../services/dialogue";

/** Universal abort for every dialogue. Safe to send at any time. */
export async function handleCancel(ctx: Context, env: Env) {
  if (!ctx.from) return;

  const aborted = cancel(env.SESSIONS, ctx.from.id);
  if (aborted.length > 0) {
    console.log(`[Cmd] /cancel from user ${ctx.from.id}: ${aborted.join(", ")}`);
    await ctx.reply("Operation cancelled.");
  } else {
    await ctx.reply("Nothing to cancel.");
  }
}
