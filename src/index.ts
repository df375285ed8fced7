/**
 * Ledger Bot: Node entry point.
 * Loads config, opens the store, then serves Telegram updates by long
 * polling or through a webhook listener.
 */

import "dotenv/config";
import http from "http";
import { createBot } from "./bot";
import { Env, loadConfig } from "./config/env";
import { openDatabase } from "./db/database";
import { COMMANDS } from "./handlers/start";
import { createRequestListener } from "./server";
import { SessionStore } from "./services/session";
import { createClock } from "./utils/date";

const SWEEP_INTERVAL_MS = 60_000;

async function main() {
  const config = loadConfig();
  const db = openDatabase(config.DATABASE_PATH);
  const sessions = new SessionStore({ ttlSeconds: config.SESSION_TTL_SECONDS });

  const env: Env = {
    BOT_TOKEN: config.BOT_TOKEN,
    BOT_INFO: config.BOT_INFO,
    DB: db,
    SESSIONS: sessions,
    CLOCK: createClock(config.UTC_OFFSET_HOURS),
    REPORT_LAYOUT: config.REPORT_LAYOUT,
    REPORT_CHUNK_SIZE: config.REPORT_CHUNK_SIZE,
    CLEAR_CONFIRM_SECONDS: config.CLEAR_CONFIRM_SECONDS,
  };

  const { bot, handleWebhook } = createBot(env);

  const sweeper = setInterval(() => {
    const evicted = sessions.sweep();
    if (evicted > 0) console.log(`[Session] Evicted ${evicted} idle session(s)`);
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();

  await bot.api
    .setMyCommands(COMMANDS.map(({ command, description }) => ({ command, description })))
    .catch((error: unknown) => console.warn("[Bot] setMyCommands failed:", error));

  if (config.BOT_MODE === "webhook") {
    const server = http.createServer(createRequestListener(handleWebhook, config.WEBHOOK_SECRET));
    server.listen(config.PORT, () => {
      console.log(`[Server] Webhook listener on port ${config.PORT}`);
    });

    const shutdown = () => {
      console.log("[Server] Shutting down");
      clearInterval(sweeper);
      server.close(() => db.close());
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
    return;
  }

  const shutdown = () => {
    console.log("[Bot] Stopping polling");
    clearInterval(sweeper);
    bot.stop().catch((error: unknown) => console.error("[Bot] Stop failed:", error));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await bot.start({
    drop_pending_updates: true,
    onStart: (info) => console.log(`[Bot] Polling as @${info.username}`),
  });
  db.close();
}

main().catch((error: unknown) => {
  console.error("[Boot] Failed to start:", error);
  process.exit(1);
});
