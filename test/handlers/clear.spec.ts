import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { handleClear, handleConfirmClear } from "../../src/handlers/clear";
import { createExpense, listExpenses } from "../../src/db/repository";
import { SessionStore } from "../../src/services/session";
import { Env } from "../../src/config/env";
import { createTestEnv } from "../helpers/env";

const mockReply = vi.fn().mockResolvedValue(undefined);

function createMockCtx(fromId?: number) {
  return {
    from: fromId ? { id: fromId, first_name: "Tester" } : undefined,
    reply: mockReply,
  } as any;
}

async function seedExpenses(env: Env, count: number) {
  for (let i = 0; i < count; i++) {
    await createExpense(env.DB, {
      contributorId: 1,
      amount: i + 1,
      category: "Food",
      occurredOn: "04/15/2025",
      displayName: "alice",
    });
  }
}

describe("clear handlers (two-step)", () => {
  let now: number;
  let env: Env;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    now = 1_000_000;
    env = createTestEnv({ SESSIONS: new SessionStore({ ttlSeconds: 600, now: () => now }) });
  });

  afterEach(() => {
    env.DB.close();
    vi.restoreAllMocks();
  });

  // ── Step 1: /clear ──
  describe("handleClear", () => {
    it("asks for confirmation and deletes nothing", async () => {
      await seedExpenses(env, 1);
      await handleClear(createMockCtx(123), env);

      expect(mockReply).toHaveBeenCalledWith(
        "⚠️ <b>Warning!</b> This deletes every expense of every user.\n\n" +
          "❗ <b>This cannot be undone.</b>\n\n" +
          "Send /confirmclear within 60 seconds to confirm.",
        { parse_mode: "HTML" }
      );
      expect(await listExpenses(env.DB)).toHaveLength(1);
      expect(env.SESSIONS.get(123, "clear_expenses")).not.toBeNull();
    });

    it("does nothing without a sender", async () => {
      await handleClear(createMockCtx(), env);
      expect(mockReply).not.toHaveBeenCalled();
    });
  });

  // ── Step 2: /confirmclear ──
  describe("handleConfirmClear", () => {
    it("refuses without a pending /clear", async () => {
      await seedExpenses(env, 2);
      await handleConfirmClear(createMockCtx(123), env);

      expect(mockReply).toHaveBeenCalledWith(
        "❌ No pending clear request.\nSend /clear first if you want to delete all expenses."
      );
      expect(await listExpenses(env.DB)).toHaveLength(2);
    });

    it("deletes every expense after /clear", async () => {
      await seedExpenses(env, 2);
      await handleClear(createMockCtx(123), env);
      mockReply.mockClear();

      await handleConfirmClear(createMockCtx(123), env);

      expect(mockReply).toHaveBeenCalledWith("🗑️ All expenses cleared (2 removed).");
      expect(await listExpenses(env.DB)).toEqual([]);
    });

    it("reports an already empty store", async () => {
      await handleClear(createMockCtx(123), env);
      mockReply.mockClear();

      await handleConfirmClear(createMockCtx(123), env);

      expect(mockReply).toHaveBeenCalledWith("📭 There were no expenses to clear.");
    });

    it("refuses once the confirmation window has passed", async () => {
      await seedExpenses(env, 1);
      await handleClear(createMockCtx(123), env);
      now += 60_000;
      mockReply.mockClear();

      await handleConfirmClear(createMockCtx(123), env);

      expect(mockReply.mock.calls[0][0]).toMatch(/^❌ No pending clear request/);
      expect(await listExpenses(env.DB)).toHaveLength(1);
    });

    it("does not accept another user's /clear", async () => {
      await seedExpenses(env, 1);
      await handleClear(createMockCtx(123), env);
      mockReply.mockClear();

      await handleConfirmClear(createMockCtx(456), env);

      expect(mockReply.mock.calls[0][0]).toMatch(/^❌ No pending clear request/);
      expect(await listExpenses(env.DB)).toHaveLength(1);
    });

    it("needs a new /clear after a successful confirm", async () => {
      await handleClear(createMockCtx(123), env);
      await handleConfirmClear(createMockCtx(123), env);
      mockReply.mockClear();

      await handleConfirmClear(createMockCtx(123), env);

      expect(mockReply.mock.calls[0][0]).toMatch(/^❌ No pending clear request/);
    });
  });
});
