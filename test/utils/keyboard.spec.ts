import { describe, it, expect } from "vitest";
import {
  CATEGORY_CHOICE,
  DELETE_CHOICE,
  choiceKeyboard,
  choicePattern,
  parseChoice,
} from "../../src/utils/keyboard";

describe("choiceKeyboard", () => {
  it("puts one option per row with nonce and index in the token", () => {
    const kb = choiceKeyboard(CATEGORY_CHOICE, "k3x", ["Food", "Transport"]);

    expect(kb.inline_keyboard).toEqual([
      [{ text: "Food", callback_data: "cat:k3x:0" }],
      [{ text: "Transport", callback_data: "cat:k3x:1" }],
    ]);
  });

  it("applies the label function to the button text only", () => {
    const kb = choiceKeyboard(DELETE_CHOICE, "a1", ["Food"], (o) => `Delete: ${o}`);

    expect(kb.inline_keyboard).toEqual([[{ text: "Delete: Food", callback_data: "del:a1:0" }]]);
  });

  it("keeps tokens short for long names", () => {
    const kb = choiceKeyboard(CATEGORY_CHOICE, "lz0abc12", ["x".repeat(200)]);
    const [[button]] = kb.inline_keyboard;

    expect(button).toMatchObject({ callback_data: "cat:lz0abc12:0" });
  });
});

describe("parseChoice", () => {
  it("reads the nonce and index back", () => {
    expect(parseChoice(CATEGORY_CHOICE, "cat:k3x:3")).toEqual({ nonce: "k3x", index: 3 });
  });

  it("rejects another prefix or malformed data", () => {
    expect(parseChoice(CATEGORY_CHOICE, "del:k3x:3")).toBeNull();
    expect(parseChoice(CATEGORY_CHOICE, "cat:3")).toBeNull();
    expect(parseChoice(CATEGORY_CHOICE, "cat:k3x:")).toBeNull();
    expect(parseChoice(CATEGORY_CHOICE, "cat:k3x:1x")).toBeNull();
    expect(parseChoice(CATEGORY_CHOICE, undefined)).toBeNull();
  });

  it("matches the same data as choicePattern", () => {
    expect(choicePattern(DELETE_CHOICE).test("del:a1:12")).toBe(true);
    expect(choicePattern(DELETE_CHOICE).test("xdel:a1:12")).toBe(false);
  });
});
