import { DEFAULT_TIMEZONE } from "@/types";
import { calendarDay, calendarDayInTimeZone, parseCalendarDate, toIsoDay } from "./timezone";

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

/** "Oct 18", "18", "Oct 18, 2025", "18, 2025", "March 3 2026" */
const PART = /^(?:([A-Za-z]{3,9})\.?\s+)?(\d{1,2})(?:,?\s+(\d{4}))?$/;

/** ISO dates and datetimes embedded in text, offset included when present. */
const ISO = /\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?/g;

export interface DateRange {
  /** YYYY-MM-DD */
  start: string;
  /** YYYY-MM-DD */
  end: string;
}

function monthFromName(name: string): number | null {
  return MONTHS[name.toLowerCase().slice(0, 3)] ?? null;
}

function cleanDateText(text: string): string {
  return text
    .replace(/[–—]/g, "-")
    .replace(/\b(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/gi, "")
    .replace(/(\d{1,2})(?:st|nd|rd|th)\b/gi, "$1")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parse listing-site date text into a calendar range.
 *
 * Handles "Oct 01 - Nov 15, 2025", "Nov 10 - 12, 2025", "Dec 20, 2025 - Jan 05, 2026",
 * "Apr 19th - 20th", "Dec 30th - Jan 2nd", single days and ISO dates or datetimes
 * (datetimes land on their day in `timeZone`). Without a year the range is the one
 * around today in `timeZone` that has not ended yet.
 */
export function parseDateRange(
  text: string | null | undefined,
  now = new Date(),
  timeZone = DEFAULT_TIMEZONE
): DateRange | null {
  if (!text) return null;

  const iso = text.match(ISO);
  if (iso) {
    const start = parseCalendarDate(iso[0], timeZone);
    const end = parseCalendarDate(iso[1] ?? iso[0], timeZone);
    if (!start || !end) return null;
    return { start: toIsoDay(start), end: toIsoDay(end) };
  }

  const pieces = cleanDateText(text).split(/\s*-\s*/);
  if (pieces.length > 2) return null;

  const left = pieces[0].match(PART);
  if (!left?.[1]) return null;
  const startMonth = monthFromName(left[1]);
  if (startMonth == null) return null;
  const startDay = Number.parseInt(left[2], 10);
  const startYearGiven = left[3] ? Number.parseInt(left[3], 10) : null;

  let endMonth = startMonth;
  let endDay = startDay;
  let endYearGiven = startYearGiven;
  if (pieces[1] !== undefined) {
    const right = pieces[1].match(PART);
    if (!right) return null;
    if (right[1]) {
      const m = monthFromName(right[1]);
      if (m == null) return null;
      endMonth = m;
    }
    endDay = Number.parseInt(right[2], 10);
    endYearGiven = right[3] ? Number.parseInt(right[3], 10) : null;
  }

  let startYear: number;
  let endYear: number;
  if (endYearGiven != null) {
    endYear = endYearGiven;
    startYear = startYearGiven ?? (startMonth > endMonth ? endYear - 1 : endYear);
  } else if (startYearGiven != null) {
    startYear = startYearGiven;
    endYear = endMonth < startMonth ? startYear + 1 : startYear;
  } else {
    const today = calendarDayInTimeZone(now, timeZone);
    const year = today.getUTCFullYear();
    const crossesYear = endMonth < startMonth;
    // A range over New Year may still be running from last December.
    endYear = year;
    startYear = crossesYear ? year - 1 : year;
    const end = calendarDay(endYear, endMonth, endDay);
    if (end && end < today) {
      startYear += 1;
      endYear += 1;
    }
  }

  const start = calendarDay(startYear, startMonth, startDay);
  const end = calendarDay(endYear, endMonth, endDay);
  if (!start || !end) return null;
  return { start: toIsoDay(start), end: toIsoDay(end) };
}
