import { describe, it, expect } from "vitest";
import { addDays, calendarDay, calendarDayInTimeZone, parseCalendarDate, toIsoDay } from "./timezone";

describe("calendarDay", () => {
  it("returns UTC midnight for a real day", () => {
    expect(calendarDay(2027, 3, 1)?.toISOString()).toBe("2027-03-01T00:00:00.000Z");
  });

  it("rejects days that would roll over", () => {
    expect(calendarDay(2027, 2, 29)).toBeNull();
    expect(calendarDay(2027, 13, 1)).toBeNull();
  });
});

describe("parseCalendarDate", () => {
  it("takes a plain ISO date as the day itself", () => {
    expect(toIsoDay(parseCalendarDate("2027-03-01", "America/Los_Angeles") ?? new Date(NaN))).toBe("2027-03-01");
  });

  it("converts an instant to the day in the feed timezone", () => {
    const day = parseCalendarDate("2027-03-01T02:00:00Z", "America/Los_Angeles");
    expect(day && toIsoDay(day)).toBe("2027-02-28");
    const utcDay = parseCalendarDate("2027-03-01T02:00:00Z", "UTC");
    expect(utcDay && toIsoDay(utcDay)).toBe("2027-03-01");
  });

  it("uses the date part of a datetime without offset", () => {
    const day = parseCalendarDate("2027-03-01T23:30:00", "Asia/Tokyo");
    expect(day && toIsoDay(day)).toBe("2027-03-01");
  });

  it("returns null for unusable input", () => {
    expect(parseCalendarDate("2027-02-30")).toBeNull();
    expect(parseCalendarDate("next week")).toBeNull();
    expect(parseCalendarDate(new Date(NaN))).toBeNull();
  });
});

describe("calendarDayInTimeZone", () => {
  it("finds the local day of an instant", () => {
    const instant = new Date("2026-10-18T23:30:00Z");
    expect(toIsoDay(calendarDayInTimeZone(instant, "UTC"))).toBe("2026-10-18");
    expect(toIsoDay(calendarDayInTimeZone(instant, "Europe/Berlin"))).toBe("2026-10-19");
  });
});

describe("addDays", () => {
  it("adds whole days", () => {
    const day = calendarDay(2026, 12, 31);
    expect(day && toIsoDay(addDays(day, 1))).toBe("2027-01-01");
  });
});
