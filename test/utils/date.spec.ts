import { describe, it, expect } from "vitest";
import {
  compareMonths,
  createClock,
  daysInMonth,
  formatDisplayDate,
  formatMonthKey,
  monthLabel,
  parseDisplayDate,
  parseMonthArg,
  previousMonth,
} from "../../src/utils/date";

describe("previousMonth", () => {
  it("steps back within a year", () => {
    expect(previousMonth({ month: 4, year: 2025 })).toEqual({ month: 3, year: 2025 });
  });

  it("rolls January back to December of the previous year", () => {
    expect(previousMonth({ month: 1, year: 2025 })).toEqual({ month: 12, year: 2024 });
  });
});

describe("parseDisplayDate", () => {
  it("parses MM/DD/YYYY", () => {
    expect(parseDisplayDate("04/15/2025")).toEqual({ year: 2025, month: 4, day: 15 });
  });

  it("accepts a leap day only in leap years", () => {
    expect(parseDisplayDate("02/29/2024")).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseDisplayDate("02/29/2025")).toBeNull();
  });

  it("rejects impossible or malformed dates", () => {
    expect(parseDisplayDate("13/01/2025")).toBeNull();
    expect(parseDisplayDate("00/10/2025")).toBeNull();
    expect(parseDisplayDate("04/31/2025")).toBeNull();
    expect(parseDisplayDate("2025-04-15")).toBeNull();
    expect(parseDisplayDate("garbage")).toBeNull();
  });
});

describe("parseMonthArg", () => {
  it("parses MM/YYYY", () => {
    expect(parseMonthArg("04/2025")).toEqual({ month: 4, year: 2025 });
    expect(parseMonthArg("4/2025")).toEqual({ month: 4, year: 2025 });
  });

  it("rejects month 13 and month 0", () => {
    expect(parseMonthArg("13/2025")).toBeNull();
    expect(parseMonthArg("00/2025")).toBeNull();
  });

  it("rejects a two-digit year or missing parts", () => {
    expect(parseMonthArg("04/25")).toBeNull();
    expect(parseMonthArg("04")).toBeNull();
    expect(parseMonthArg("april/2025")).toBeNull();
  });
});

describe("formatting", () => {
  it("pads the display date", () => {
    expect(formatDisplayDate({ year: 2025, month: 4, day: 5 })).toBe("04/05/2025");
  });

  it("formats the month key and label", () => {
    expect(formatMonthKey({ month: 4, year: 2025 })).toBe("04/2025");
    expect(monthLabel({ month: 12, year: 2024 })).toBe("December 2024");
  });

  it("knows month lengths", () => {
    expect(daysInMonth(2, 2024)).toBe(29);
    expect(daysInMonth(4, 2025)).toBe(30);
    expect(daysInMonth(12, 2025)).toBe(31);
  });

  it("orders months by year then month", () => {
    expect(compareMonths({ month: 12, year: 2024 }, { month: 1, year: 2025 })).toBeLessThan(0);
    expect(compareMonths({ month: 5, year: 2025 }, { month: 4, year: 2025 })).toBeGreaterThan(0);
    expect(compareMonths({ month: 4, year: 2025 }, { month: 4, year: 2025 })).toBe(0);
  });
});

describe("createClock", () => {
  const now = () => new Date("2025-04-15T22:30:00Z");

  it("uses the UTC date at offset 0", () => {
    expect(createClock(0, now).today()).toEqual({ year: 2025, month: 4, day: 15 });
  });

  it("moves to the next day east of UTC", () => {
    expect(createClock(7, now).today()).toEqual({ year: 2025, month: 4, day: 16 });
  });

  it("rolls back across a year boundary west of UTC", () => {
    const clock = createClock(-12, () => new Date("2025-01-01T05:00:00Z"));
    expect(clock.today()).toEqual({ year: 2024, month: 12, day: 31 });
  });
});
