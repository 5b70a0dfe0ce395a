import { DEFAULT_TIMEZONE } from "@/types";

const DAY_MS = 24 * 60 * 60 * 1000;

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

/**
 * Calendar day as a Date at UTC midnight. Returns null for impossible days
 * (Feb 30, month 13) instead of letting Date roll them over.
 * `month` is 1-12.
 */
export function calendarDay(year: number, month: number, day: number): Date | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (
    Number.isNaN(d.getTime()) ||
    d.getUTCFullYear() !== year ||
    d.getUTCMonth() !== month - 1 ||
    d.getUTCDate() !== day
  ) {
    return null;
  }
  return d;
}

/** The calendar day an instant falls on in `timeZone`. */
export function calendarDayInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): Date {
  const parts = getFormatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find((p) => p.type === type)?.value ?? "", 10);
  return new Date(Date.UTC(get("year"), get("month") - 1, get("day")));
}

function hasExplicitOffset(iso: string): boolean {
  // Ends with Z or has a numeric offset like -08:00 / +0000
  return /[zZ]$/.test(iso) || /[+-]\d{2}:?\d{2}$/.test(iso);
}

/**
 * Parse an ISO date or datetime into a calendar day.
 * - "2026-03-01" is that day.
 * - A datetime with an offset/Z is converted to the day it falls on in `timeZone`.
 * - An offset-less datetime is already local, so its date part is the day.
 */
export function parseCalendarDate(
  value: string | Date,
  timeZone = DEFAULT_TIMEZONE
): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : calendarDayInTimeZone(value, timeZone);
  }
  const s = value.trim();
  if (!s) return null;

  const m = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{2}):(\d{2}).*)?$/);
  if (!m) return null;

  if (m[4] !== undefined && hasExplicitOffset(s)) {
    const d = new Date(s);
    if (Number.isNaN(d.getTime())) return null;
    return calendarDayInTimeZone(d, timeZone);
  }

  return calendarDay(
    Number.parseInt(m[1], 10),
    Number.parseInt(m[2], 10),
    Number.parseInt(m[3], 10)
  );
}

/** "YYYY-MM-DD" for a calendar day produced by this module. */
export function toIsoDay(day: Date): string {
  return day.toISOString().slice(0, 10);
}

export function addDays(day: Date, days: number): Date {
  return new Date(day.getTime() + days * DAY_MS);
}
