/**
 * /add dialogue: prompt for the amount, offer the categories as an
 * inline keyboard, save on selection.
 */

import { Context } from "grammy";
import { Env } from "../config/env";
import { beginExpenseEntry, selectCategory, submitAmount } from "../services/dialogue";
import { SessionExpiredError, ValidationError } from "../services/errors";
import { displayNameOf, replaceOrReply, replyFailure } from "./failure";
import { formatAmount, formatSaved } from "../utils/formatter";
import { CATEGORY_CHOICE, choiceKeyboard, parseChoice } from "../utils/keyboard";
import { Expense } from "../types/expense";

export const EXPIRED_ENTRY = "⌛ This entry has expired. Start again with /add.";

export async function handleAdd(ctx: Context, env: Env) {
  if (!ctx.from) return;

  beginExpenseEntry(env.SESSIONS, ctx.from.id);
  await ctx.reply("Enter the expense amount:");
}

export async function handleAmount(ctx: Context, env: Env, text: string) {
  if (!ctx.from) return;

  try {
    const { amount, options, nonce } = await submitAmount(
      env.DB,
      env.SESSIONS,
      ctx.from.id,
      text
    );
    await ctx.reply(`Amount: ${formatAmount(amount)}\nChoose a category:`, {
      reply_markup: choiceKeyboard(CATEGORY_CHOICE, nonce, options),
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      await ctx.reply("Please enter a valid number, e.g. 12.50. Try again:");
      return;
    }
    if (error instanceof SessionExpiredError) {
      await ctx.reply(EXPIRED_ENTRY);
      return;
    }
    await replyFailure(ctx, "/add", error);
  }
}

/** Callback for the cat:<nonce>:<index> buttons. */
export async function handleCategoryChoice(ctx: Context, env: Env) {
  if (!ctx.from) return;

  const choice = parseChoice(CATEGORY_CHOICE, ctx.callbackQuery?.data);
  await ctx.answerCallbackQuery();
  if (choice === null) return;

  let expense: Expense;
  try {
    expense = await selectCategory(
      env.DB,
      env.SESSIONS,
      ctx.from.id,
      choice,
      displayNameOf(ctx.from),
      env.CLOCK.today()
    );
  } catch (error) {
    if (error instanceof SessionExpiredError) {
      await ctx.editMessageText(EXPIRED_ENTRY);
      return;
    }
    if (error instanceof ValidationError) {
      await ctx.reply("⚠️ That category is no longer offered. Pick one from the list or /cancel.");
      return;
    }
    await replyFailure(ctx, "/add", error);
    return;
  }

  // Saved already: a failed edit must not read as a failed save
  await replaceOrReply(ctx, formatSaved(expense));
}
