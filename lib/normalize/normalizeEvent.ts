import {
  DEFAULT_TIMEZONE,
  ONLINE_LOCATION,
  UNKNOWN_LOCATION,
  type HackathonEvent,
  type SourceId,
} from "@/types";
import type { RawHackathon } from "@/lib/scrapers/types";
import { parseCalendarDate } from "@/lib/scrapers/timezone";

const ONLINE_WORDS = /\b(online|virtual|remote|digital)\b/i;
const PHYSICAL_WORDS = /\b(hybrid|in[- ]person)\b/i;
/** Query params that only track where a click came from. */
const TRACKING_PARAM = /^(utm_|ref_)/i;

/**
 * Absolute http(s) URL without tracking params, fragment or trailing slash,
 * so the same listing from two pages compares equal. Null if not a usable URL.
 */
export function canonicalUrl(url: string): string | null {
  let u: URL;
  try {
    u = new URL(url.trim());
  } catch {
    return null;
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") return null;
  for (const key of [...u.searchParams.keys()]) {
    if (TRACKING_PARAM.test(key)) u.searchParams.delete(key);
  }
  u.hash = "";
  if (u.pathname.length > 1 && u.pathname.endsWith("/")) {
    u.pathname = u.pathname.replace(/\/+$/, "");
  }
  return u.toString();
}

/** "online" for online-only events, otherwise the trimmed location text (or TBA). */
export function normalizeLocation(location: string | null | undefined, online?: boolean): string {
  const text = location?.replace(/\s+/g, " ").trim() ?? "";
  if (online) return ONLINE_LOCATION;
  if (ONLINE_WORDS.test(text) && !PHYSICAL_WORDS.test(text)) return ONLINE_LOCATION;
  return text || UNKNOWN_LOCATION;
}

/**
 * Normalize a raw hackathon: collapse the title, canonicalize the url, turn dates into
 * calendar days in `timeZone` (end defaults to start; a reversed range is swapped)
 * and classify the location. Throws when title, url or start date is unusable.
 */
export function normalizeEvent(
  raw: RawHackathon,
  source: SourceId,
  timeZone = DEFAULT_TIMEZONE
): HackathonEvent {
  const title = raw.title.replace(/\s+/g, " ").trim();
  if (!title) throw new Error("Missing title");

  const url = canonicalUrl(raw.url);
  if (!url) throw new Error(`Invalid url: ${raw.url}`);

  if (raw.startDate == null || raw.startDate === "") throw new Error("Missing start date");
  const start = parseCalendarDate(raw.startDate, timeZone);
  if (!start) throw new Error(`Invalid date: ${String(raw.startDate)}`);

  const end =
    raw.endDate == null || raw.endDate === "" ? start : parseCalendarDate(raw.endDate, timeZone) ?? start;

  const [startDate, endDate] = end < start ? [end, start] : [start, end];

  return {
    title,
    url,
    startDate,
    endDate,
    location: normalizeLocation(raw.location, raw.online),
    source,
  };
}
