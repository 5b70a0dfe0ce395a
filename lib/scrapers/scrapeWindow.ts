import { readPositiveInt } from "@/lib/config";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * How far ahead the feed reaches. Hackathons are announced months in advance,
 * so the default is a year; anything starting later is dropped by the pipeline.
 */
export function getScrapeWindowDays(): number {
  return readPositiveInt("SCRAPE_WINDOW_DAYS", 365);
}

/** Last calendar day (UTC midnight) an event may start on, counted from `today`. */
export function getScrapeCutoffDate(today: Date, days = getScrapeWindowDays()): Date {
  return new Date(today.getTime() + days * DAY_MS);
}
