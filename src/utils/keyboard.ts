import { InlineKeyboard } from "grammy";

export const CATEGORY_CHOICE = "cat";
export const DELETE_CHOICE = "del";

/** A decoded button tap: the keyboard's nonce and the option index. */
export interface Choice {
  nonce: string;
  index: number;
}

/**
 * One button per option. The callback token is `<prefix>:<nonce>:<index>`:
 * the nonce ties it to the keyboard that was shown and the index points
 * into the option list kept in the session, well under Telegram's 64-byte
 * callback limit.
 */
export function choiceKeyboard(
  prefix: string,
  nonce: string,
  options: readonly string[],
  label: (option: string) => string = (o) => o
): InlineKeyboard {
  return InlineKeyboard.from(
    options.map((option, i) => [InlineKeyboard.text(label(option), `${prefix}:${nonce}:${i}`)])
  );
}

export function choicePattern(prefix: string): RegExp {
  return new RegExp(`^${prefix}:([0-9a-z]+):(\\d+)$`);
}

export function parseChoice(prefix: string, data: string | undefined): Choice | null {
  if (!data) return null;
  const m = choicePattern(prefix).exec(data);
  return m ? { nonce: m[1], index: parseInt(m[2], 10) } : null;
}
