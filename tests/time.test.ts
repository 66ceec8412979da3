import { describe, it, expect } from "vitest";
import { minutesBetween, parseTimestamp, weekOf, wholeDaysBetween } from "../src/utils/time";

describe("parseTimestamp", () => {
  it("reads the dotted terminal format", () => {
    expect(parseTimestamp("2025.01.15 09:30:00")).toBe("2025-01-15T09:30:00");
    expect(parseTimestamp("2025.1.5 9:05")).toBe("2025-01-05T09:05:00");
  });

  it("reads ISO-like strings and keeps the written clock time", () => {
    expect(parseTimestamp("2025-01-15T09:30:00")).toBe("2025-01-15T09:30:00");
    expect(parseTimestamp("2025-01-15 09:30:00.250")).toBe("2025-01-15T09:30:00");
    expect(parseTimestamp("2025-01-15T09:30:00+02:00")).toBe("2025-01-15T09:30:00");
    expect(parseTimestamp("2025/01/15")).toBe("2025-01-15T00:00:00");
  });

  it("converts Excel serial dates", () => {
    expect(parseTimestamp(45672.395833333336)).toBe("2025-01-15T09:30:00");
  });

  it("rejects garbage and impossible dates", () => {
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp("2025.02.30 10:00:00")).toBeNull();
    expect(parseTimestamp("2025.01.15 25:00:00")).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(-3)).toBeNull();
  });
});

describe("minutesBetween", () => {
  it("truncates to whole minutes", () => {
    expect(minutesBetween("2025-01-15T09:30:00", "2025-01-15T10:45:59")).toBe(75);
  });

  it("is 0 when a side is missing", () => {
    expect(minutesBetween("2025-01-15T09:30:00", null)).toBe(0);
  });

  it("goes negative when close precedes open", () => {
    expect(minutesBetween("2025-01-15T10:00:00", "2025-01-15T09:30:00")).toBe(-30);
  });
});

describe("wholeDaysBetween", () => {
  it("floors partial days", () => {
    expect(wholeDaysBetween("2025-01-06T09:00:00", "2025-02-04T09:15:00")).toBe(29);
    expect(wholeDaysBetween("2025-01-06T09:00:00", "2025-01-07T08:59:59")).toBe(0);
  });
});

describe("weekOf", () => {
  it("returns the Monday of the week", () => {
    expect(weekOf("2025-01-06T09:00:00")).toBe("2025-01-06");
    expect(weekOf("2025-01-12T23:59:59")).toBe("2025-01-06");
    expect(weekOf("2025-01-05T08:00:00")).toBe("2024-12-30");
  });
});
