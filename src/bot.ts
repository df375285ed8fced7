import { Bot, webhookCallback } from "grammy";
import { Env } from "./config/env";
import { handleStart, handleHelp } from "./handlers/start";
import { handleAdd, handleCategoryChoice } from "./handlers/expense";
import {
  handleCategories,
  handleAddCategory,
  handleDeleteCategory,
  handleDeleteChoice,
} from "./handlers/category";
import { handleReport, handleMonth, handlePrevMonth } from "./handlers/report";
import { handleClear, handleConfirmClear } from "./handlers/clear";
import { handleCancel } from "./handlers/cancel";
import { handleMessage } from "./handlers/message";
import { CATEGORY_CHOICE, DELETE_CHOICE, choicePattern } from "./utils/keyboard";

export function createBot(env: Env) {
  const bot = new Bot(env.BOT_TOKEN, {
    botInfo: env.BOT_INFO ? JSON.parse(env.BOT_INFO) : undefined,
  });

  bot.command("start", (ctx) => handleStart(ctx, env));
  bot.command("help", (ctx) => handleHelp(ctx));
  bot.command("cancel", (ctx) => handleCancel(ctx, env));

  // === EXPENSE DIALOGUE ===
  bot.command("add", (ctx) => handleAdd(ctx, env));
  bot.callbackQuery(choicePattern(CATEGORY_CHOICE), (ctx) => handleCategoryChoice(ctx, env));

  // === REPORTS (read-only) ===
  bot.command("report", (ctx) => handleReport(ctx, env));
  bot.command("month", (ctx) => handleMonth(ctx, env));
  bot.command("prev_month", (ctx) => handlePrevMonth(ctx, env));

  // === DESTRUCTIVE: two-step ===
  bot.command("clear", (ctx) => handleClear(ctx, env));
  bot.command("confirmclear", (ctx) => handleConfirmClear(ctx, env));

  // === CATEGORIES ===
  bot.command("categories", (ctx) => handleCategories(ctx, env));
  bot.command("add_category", (ctx) => handleAddCategory(ctx, env));
  bot.command("delete_category", (ctx) => handleDeleteCategory(ctx, env));
  bot.callbackQuery(choicePattern(DELETE_CHOICE), (ctx) => handleDeleteChoice(ctx, env));

  // Stale or foreign buttons: stop the client spinner, nothing else
  bot.on("callback_query:data", (ctx) => ctx.answerCallbackQuery());

  // Catch-all: free text goes to whichever dialogue is waiting for it
  bot.on("message:text", (ctx) => handleMessage(ctx, env));

  bot.catch((err) => {
    console.error(`[Bot] Error while handling update ${err.ctx.update.update_id}:`, err.error);
  });

  return {
    bot,
    handleWebhook: webhookCallback(bot, "http"),
  };
}
