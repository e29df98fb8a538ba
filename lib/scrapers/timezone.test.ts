import { describe, it, expect } from "vitest";
import { compareDates, dateInTimeZone, isValidDate, toIsoDate } from "./timezone";

describe("dateInTimeZone", () => {
  it("rolls over to the next day in London during BST", () => {
    expect(dateInTimeZone(new Date("2025-05-07T23:30:00Z"), "Europe/London")).toEqual({
      year: 2025,
      month: 5,
      day: 8,
    });
  });

  it("matches UTC in London during GMT", () => {
    expect(dateInTimeZone(new Date("2025-01-15T23:30:00Z"), "Europe/London")).toEqual({
      year: 2025,
      month: 1,
      day: 15,
    });
  });

  it("honours other zones", () => {
    expect(dateInTimeZone(new Date("2025-05-08T02:00:00Z"), "America/New_York")).toEqual({
      year: 2025,
      month: 5,
      day: 7,
    });
  });
});

describe("compareDates", () => {
  it("orders by year, then month, then day", () => {
    expect(compareDates({ year: 2025, month: 5, day: 8 }, { year: 2025, month: 5, day: 8 })).toBe(0);
    expect(compareDates({ year: 2025, month: 5, day: 7 }, { year: 2025, month: 5, day: 8 })).toBeLessThan(0);
    expect(compareDates({ year: 2025, month: 6, day: 1 }, { year: 2025, month: 5, day: 31 })).toBeGreaterThan(0);
    expect(compareDates({ year: 2024, month: 12, day: 31 }, { year: 2025, month: 1, day: 1 })).toBeLessThan(0);
  });
});

describe("toIsoDate", () => {
  it("zero-pads each field", () => {
    expect(toIsoDate({ year: 2025, month: 5, day: 8 })).toBe("2025-05-08");
  });
});

describe("isValidDate", () => {
  it("rejects out-of-range months and days", () => {
    expect(isValidDate({ year: 2025, month: 13, day: 1 })).toBe(false);
    expect(isValidDate({ year: 2025, month: 4, day: 31 })).toBe(false);
    expect(isValidDate({ year: 2025, month: 4, day: 30 })).toBe(true);
  });
});
