import { Context } from "grammy";
import { Env } from "../config/env";
import { listCategories } from "../services/category";
import {
  beginCategoryDeletion,
  beginCategoryEntry,
  confirmCategoryDeletion,
  submitCategoryName,
} from "../services/dialogue";
import { AlreadyExistsError, SessionExpiredError, ValidationError } from "../services/errors";
import { replaceOrReply, replyFailure } from "./failure";
import { formatCategoryList } from "../utils/formatter";
import { DELETE_CHOICE, choiceKeyboard, parseChoice } from "../utils/keyboard";
import { escapeHtml } from "../utils/validator";

export async function handleCategories(ctx: Context, env: Env) {
  try {
    const categories = await listCategories(env.DB, "global");
    await ctx.reply(formatCategoryList(categories), { parse_mode: "HTML" });
  } catch (error) {
    await replyFailure(ctx, "/categories", error);
  }
}

export async function handleAddCategory(ctx: Context, env: Env) {
  if (!ctx.from) return;

  beginCategoryEntry(env.SESSIONS, ctx.from.id);
  await ctx.reply("Enter the name of the new category:");
}

export async function handleCategoryName(ctx: Context, env: Env, text: string) {
  if (!ctx.from) return;

  try {
    const name = await submitCategoryName(env.DB, env.SESSIONS, ctx.from.id, text);
    console.log(`[Cmd] Category "${name}" added by ${ctx.from.id}`);
    await ctx.reply(`✅ Category '${escapeHtml(name)}' added for everyone!`, {
      parse_mode: "HTML",
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      await ctx.reply(`⚠️ ${error.message}. Try again:`);
      return;
    }
    if (error instanceof AlreadyExistsError) {
      await ctx.reply(`Category '${escapeHtml(error.value)}' already exists.`, {
        parse_mode: "HTML",
      });
      return;
    }
    if (error instanceof SessionExpiredError) {
      await ctx.reply("⌛ This prompt has expired. Send /add_category again.");
      return;
    }
    await replyFailure(ctx, "/add_category", error);
  }
}

export async function handleDeleteCategory(ctx: Context, env: Env) {
  if (!ctx.from) return;

  try {
    const prompt = await beginCategoryDeletion(env.DB, env.SESSIONS, ctx.from.id);
    if (!prompt) {
      await ctx.reply("No categories to delete.");
      return;
    }
    await ctx.reply("Choose a category to delete:", {
      reply_markup: choiceKeyboard(
        DELETE_CHOICE,
        prompt.nonce,
        prompt.options,
        (o) => `Delete: ${o}`
      ),
    });
  } catch (error) {
    await replyFailure(ctx, "/delete_category", error);
  }
}

/** Callback for the del:<nonce>:<index> buttons. */
export async function handleDeleteChoice(ctx: Context, env: Env) {
  if (!ctx.from) return;

  const choice = parseChoice(DELETE_CHOICE, ctx.callbackQuery?.data);
  await ctx.answerCallbackQuery();
  if (choice === null) return;

  let name: string;
  try {
    name = await confirmCategoryDeletion(env.DB, env.SESSIONS, ctx.from.id, choice);
  } catch (error) {
    if (error instanceof SessionExpiredError) {
      await ctx.editMessageText("⌛ This selection has expired. Send /delete_category again.");
      return;
    }
    if (error instanceof ValidationError) {
      await ctx.reply("⚠️ That category is no longer offered. Send /delete_category again.");
      return;
    }
    await replyFailure(ctx, "/delete_category", error);
    return;
  }

  await replaceOrReply(ctx, `🗑️ Category '${escapeHtml(name)}' deleted for everyone.`);
}
