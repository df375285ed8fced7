export const MAX_AMOUNT = 100_000_000;
export const MAX_CATEGORY_LENGTH = 48;

const DECIMAL_PATTERN = /^(?:\d+(?:[.,]\d*)?|[.,]\d+)$/;

/**
 * Parse a user-typed amount ("12.50", "7", "3,5", ".5", "5.").
 * Returns null unless it is a plain positive decimal within MAX_AMOUNT.
 */
export function parseAmount(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const num = Number(trimmed.replace(",", "."));
  if (!Number.isFinite(num) || num <= 0 || num > MAX_AMOUNT) {
    return null;
  }
  return num;
}

/**
 * Escape text for Telegram HTML replies.
 * & must go first so &lt; is not double-escaped.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Sum two money values without drifting past cents. */
export function addAmounts(a: number, b: number): number {
  return Math.round((a + b) * 100) / 100;
}
