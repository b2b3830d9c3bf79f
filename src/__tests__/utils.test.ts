import { describe, expect, it } from "vitest";
import { formatDateOnly, formatMonthKey, parseDateArg, previousMonday, startOfUtcDay } from "../utils.js";

describe("previousMonday", () => {
  it.each([
    ["2024-01-01T12:00:00.000Z", "2024-01-01T12:00:00.000Z"],
    ["2024-01-03T08:30:00.000Z", "2024-01-01T08:30:00.000Z"],
    ["2024-01-07T23:00:00.000Z", "2024-01-01T23:00:00.000Z"]
  ])("maps %s to %s", (input, expected) => {
    expect(previousMonday(new Date(input)).toISOString()).toBe(expected);
  });
});

describe("startOfUtcDay", () => {
  it("truncates to midnight", () => {
    expect(startOfUtcDay(Date.parse("2024-05-06T17:45:00.000Z"))).toBe(Date.UTC(2024, 4, 6));
  });
});

describe("parseDateArg", () => {
  it("reads plain dates as UTC midnight by default", () => {
    expect(parseDateArg("2024-03-01").toISOString()).toBe("2024-03-01T00:00:00.000Z");
  });

  it("reads wall time in the given zone", () => {
    expect(parseDateArg("2024-01-15 09:00", "Europe/Ljubljana").toISOString()).toBe("2024-01-15T08:00:00.000Z");
  });

  it("keeps an explicit offset", () => {
    expect(parseDateArg("2024-01-15T09:00:00+05:00", "Europe/Ljubljana").toISOString()).toBe(
      "2024-01-15T04:00:00.000Z"
    );
  });

  it("rejects unparseable values", () => {
    expect(() => parseDateArg("next tuesday")).toThrow("Invalid date value: next tuesday");
  });
});

describe("date formatting", () => {
  const value = new Date("2024-02-01T03:00:00.000Z");

  it("uses UTC without a zone", () => {
    expect(formatMonthKey(value)).toBe("2024-02");
    expect(formatDateOnly(value)).toBe("2024-02-01");
  });

  it("follows the given zone", () => {
    expect(formatMonthKey(value, "America/New_York")).toBe("2024-01");
    expect(formatDateOnly(value, "America/New_York")).toBe("2024-01-31");
  });
});
