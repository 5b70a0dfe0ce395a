import { DEFAULT_TIMEZONE } from "@/types";

/**
 * Runtime settings, read from the environment on each call so tests and the
 * scheduler see changes without a restart. The CLI loads .env via dotenv first.
 */

export function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

/** Like readPositiveInt but accepts 0. */
export function readNonNegativeInt(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) return fallback;
  return n;
}

function readString(name: string, fallback: string): string {
  return process.env[name]?.trim() || fallback;
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}

export function getFeedPath(): string {
  return readString("HACKATHONS_FEED_PATH", "data/hackathons.json");
}

export function getCuratedSource(): string {
  return readString("CURATED_HACKATHONS_PATH", "data/curated-hackathons.json");
}

export function getDevpostApiBase(): string {
  return readString("DEVPOST_API_BASE", "https://devpost.com").replace(/\/+$/, "");
}

export function getDevpostMaxPages(): number {
  return readPositiveInt("DEVPOST_MAX_PAGES", 5);
}

export function getMlhBaseUrl(): string {
  return readString("MLH_BASE_URL", "https://mlh.io").replace(/\/+$/, "");
}

/** MLH seasons are named after the year they end in; a new one opens in July. */
export function getMlhSeason(now = new Date()): string {
  const explicit = process.env.MLH_SEASON?.trim();
  if (explicit && /^\d{4}$/.test(explicit)) return explicit;
  const year = now.getUTCFullYear();
  return String(now.getUTCMonth() >= 6 ? year + 1 : year);
}

export function getFeedTimeZone(): string {
  const tz = readString("FEED_TIMEZONE", DEFAULT_TIMEZONE);
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
    return tz;
  } catch {
    console.warn(`[config] Unknown FEED_TIMEZONE "${tz}", using ${DEFAULT_TIMEZONE}`);
    return DEFAULT_TIMEZONE;
  }
}

export function getFeedMaxEvents(): number {
  return readPositiveInt("FEED_MAX_EVENTS", 50);
}

export function getSourceTimeoutMs(): number {
  return readPositiveInt("SCRAPE_SOURCE_TIMEOUT_MS", 60_000);
}

export function getScrapeCron(): string {
  return readString("SCRAPE_CRON", "0 */6 * * *");
}

export function isBrowserFallbackEnabled(): boolean {
  return readFlag("SCRAPE_BROWSER_FALLBACK", true);
}

export function getChromiumPath(): string | undefined {
  return process.env.PLAYWRIGHT_CHROMIUM_PATH?.trim() || undefined;
}

export function getFetchAttempts(): number {
  return readPositiveInt("FETCH_ATTEMPTS", 3);
}

export function getFetchTimeoutMs(): number {
  return readPositiveInt("FETCH_TIMEOUT_MS", 15_000);
}

export function getFetchRetryDelayMs(): number {
  return readNonNegativeInt("FETCH_RETRY_DELAY_MS", 1_000);
}

export function getDedupeToleranceDays(): number {
  return readNonNegativeInt("DEDUPE_TOLERANCE_DAYS", 1);
}
