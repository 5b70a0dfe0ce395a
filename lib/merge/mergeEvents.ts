import { SOURCE_PRIORITY, UNKNOWN_LOCATION, type HackathonEvent } from "@/types";
import { addDays } from "@/lib/scrapers/timezone";

export interface MergeOptions {
  /** Days of slack when comparing date ranges; listing sites disagree by a day around timezones. */
  toleranceDays?: number;
}

/**
 * Title key for duplicate detection: lower-cased, accents stripped, "&" read as "and",
 * punctuation and standalone years dropped ("HackMIT 2025" == "hackmit").
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, " ")
    .split(" ")
    .filter((word) => word && !/^(19|20)\d{2}$/.test(word))
    .join(" ");
}

export function rangesOverlap(a: HackathonEvent, b: HackathonEvent, toleranceDays = 0): boolean {
  return (
    a.startDate <= addDays(b.endDate, toleranceDays) &&
    b.startDate <= addDays(a.endDate, toleranceDays)
  );
}

export function isDuplicate(a: HackathonEvent, b: HackathonEvent, toleranceDays = 0): boolean {
  if (a.url === b.url) return true;
  return normalizeTitle(a.title) === normalizeTitle(b.title) && rangesOverlap(a, b, toleranceDays);
}

/** Feed order: start date, then title, then source priority, then url. */
export function compareEvents(a: HackathonEvent, b: HackathonEvent): number {
  return (
    a.startDate.getTime() - b.startDate.getTime() ||
    a.title.toLowerCase().localeCompare(b.title.toLowerCase()) ||
    SOURCE_PRIORITY[b.source] - SOURCE_PRIORITY[a.source] ||
    a.url.localeCompare(b.url)
  );
}

/**
 * Merge per-source lists into one ordered list without duplicates.
 * Records from higher-priority sources (curated > devpost > mlh) are kept; within a
 * source the earlier record wins. A kept record without a location borrows the
 * dropped duplicate's.
 */
export function mergeEvents(lists: HackathonEvent[][], opts: MergeOptions = {}): HackathonEvent[] {
  const toleranceDays = opts.toleranceDays ?? 0;

  const candidates = lists
    .flat()
    .map((event, index) => ({ event, index }))
    .sort((a, b) => SOURCE_PRIORITY[b.event.source] - SOURCE_PRIORITY[a.event.source] || a.index - b.index)
    .map(({ event }) => event);

  const kept: HackathonEvent[] = [];
  const byTitle = new Map<string, HackathonEvent[]>();
  const urls = new Set<string>();

  for (const candidate of candidates) {
    const key = normalizeTitle(candidate.title);
    const sameTitle = byTitle.get(key) ?? [];
    // Only records sharing the url or the title key can be duplicates.
    const pool = urls.has(candidate.url) ? kept : sameTitle;
    const existing = pool.find((k) => isDuplicate(k, candidate, toleranceDays));

    if (existing) {
      if (existing.location === UNKNOWN_LOCATION && candidate.location !== UNKNOWN_LOCATION) {
        existing.location = candidate.location;
      }
      continue;
    }

    const copy = { ...candidate };
    kept.push(copy);
    urls.add(copy.url);
    byTitle.set(key, [...sameTitle, copy]);
  }

  return kept.sort(compareEvents);
}
