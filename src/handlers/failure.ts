import { Context } from "grammy";
import { StoreUnavailableError } from "../services/errors";

export const GENERIC_FAILURE = "⚠️ Something went wrong while reading or saving data. Please try again.";

/**
 * Last-resort reply for a command: log for operators, generic text for
 * the user. Session state is left as the failing step found it.
 */
export async function replyFailure(ctx: Context, command: string, error: unknown): Promise<void> {
  if (error instanceof StoreUnavailableError) {
    console.error(`[Cmd] ${command} store unavailable (${error.operation}):`, error.cause);
  } else {
    console.error(`[Cmd] ${command} error:`, error);
  }
  await ctx.reply(GENERIC_FAILURE);
}

/**
 * Swap the keyboard message for `html`. When the edit fails (message too
 * old, deleted, or unchanged) the text goes out as a fresh reply.
 */
export async function replaceOrReply(ctx: Context, html: string): Promise<void> {
  try {
    await ctx.editMessageText(html, { parse_mode: "HTML" });
  } catch (error) {
    console.warn("[Cmd] editMessageText failed, replying instead:", error);
    await ctx.reply(html, { parse_mode: "HTML" });
  }
}

/** Label used in reports: @username when set, first name otherwise. */
export function displayNameOf(from: { username?: string; first_name: string }): string {
  return from.username ?? from.first_name;
}
