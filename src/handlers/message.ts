import { Context } from "grammy";
import { Env } from "../config/env";
import { activeTextFlow } from "../services/dialogue";
import { assertNever } from "../utils/assert";
import { handleAmount } from "./expense";
import { handleCategoryName } from "./category";

export const IDLE_HINT = "Use /add to record an expense or /help to see every command.";

/**
 * Catch-all for text messages: hand the text to whichever dialogue is
 * waiting for it. Expense entry wins over category naming.
 */
export async function handleMessage(ctx: Context, env: Env) {
  const text = ctx.message?.text;
  if (!text || !ctx.from) return;

  // Registered commands never reach this handler
  if (text.startsWith("/")) {
    await ctx.reply("Unknown command. See /help.");
    return;
  }

  const step = activeTextFlow(env.SESSIONS, ctx.from.id);
  if (step === null) {
    await ctx.reply(IDLE_HINT);
    return;
  }

  switch (step) {
    case "expense_amount":
      await handleAmount(ctx, env, text);
      return;
    case "expense_category":
      await ctx.reply("👆 Pick a category from the buttons above, or /cancel.");
      return;
    case "category_name":
      await handleCategoryName(ctx, env, text);
      return;
    default:
      assertNever(step);
  }
}
