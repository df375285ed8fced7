import { Context } from "grammy";
import { Env } from "../config/env";
import { confirmClear, requestClear } from "../services/dialogue";
import { SessionExpiredError } from "../services/errors";
import { replyFailure } from "./failure";

/**
 * /clear: step 1: ask for confirmation.
 * Does NOT delete anything yet; opens a CLEAR_CONFIRM_SECONDS window.
 */
export async function handleClear(ctx: Context, env: Env) {
  if (!ctx.from) return;

  requestClear(env.SESSIONS, ctx.from.id, env.CLEAR_CONFIRM_SECONDS);

  await ctx.reply(
    "⚠️ <b>Warning!</b> This deletes every expense of every user.\n\n" +
      "❗ <b>This cannot be undone.</b>\n\n" +
      `Send /confirmclear within ${env.CLEAR_CONFIRM_SECONDS} seconds to confirm.`,
    { parse_mode: "HTML" }
  );
}

/**
 * /confirmclear: step 2: actually delete.
 * Only works if /clear was sent by the same user inside the window.
 */
export async function handleConfirmClear(ctx: Context, env: Env) {
  if (!ctx.from) return;

  let deleted: number;
  try {
    deleted = await confirmClear(env.DB, env.SESSIONS, ctx.from.id);
  } catch (error) {
    if (error instanceof SessionExpiredError) {
      await ctx.reply(
        "❌ No pending clear request.\nSend /clear first if you want to delete all expenses."
      );
      return;
    }
    await replyFailure(ctx, "/confirmclear", error);
    return;
  }

  if (deleted === 0) {
    await ctx.reply("📭 There were no expenses to clear.");
    return;
  }
  await ctx.reply(`🗑️ All expenses cleared (${deleted} removed).`);
}
