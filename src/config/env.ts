import type Database from "better-sqlite3";
import { z } from "zod";
import type { SessionStore } from "../services/session";
import type { Clock } from "../utils/date";
import type { ReportLayout } from "../types/expense";

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => {
    if (typeof v === "string" && v.trim().length === 0) return undefined;
    return v;
  }, schema);

const ConfigSchema = z.object({
  BOT_TOKEN: z.string().min(1),
  /** Cached getMe result (JSON). Skips the getMe call on boot. */
  BOT_INFO: emptyToUndefined(z.string().optional()),
  DATABASE_PATH: emptyToUndefined(z.string().default("data/ledger.db")),
  BOT_MODE: emptyToUndefined(z.enum(["polling", "webhook"]).default("polling")),
  PORT: emptyToUndefined(z.coerce.number().int().min(1).max(65535).default(8080)),
  WEBHOOK_SECRET: emptyToUndefined(z.string().min(1).optional()),
  REPORT_LAYOUT: emptyToUndefined(
    z.enum(["current_month", "by_month"]).default("current_month")
  ),
  /** Lower bound fits the longest possible expense line under its header */
  REPORT_CHUNK_SIZE: emptyToUndefined(
    z.coerce.number().int().min(1024).max(4096).default(3500)
  ),
  SESSION_TTL_SECONDS: emptyToUndefined(z.coerce.number().int().min(1).default(600)),
  CLEAR_CONFIRM_SECONDS: emptyToUndefined(z.coerce.number().int().min(1).default(60)),
  UTC_OFFSET_HOURS: emptyToUndefined(z.coerce.number().min(-12).max(14).default(0)),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }
  return parsed.data;
}

/** Everything a handler needs: parsed config plus live bindings. */
export interface Env {
  BOT_TOKEN: string;
  BOT_INFO?: string;
  DB: Database.Database;
  SESSIONS: SessionStore;
  CLOCK: Clock;
  REPORT_LAYOUT: ReportLayout;
  REPORT_CHUNK_SIZE: number;
  CLEAR_CONFIRM_SECONDS: number;
}
