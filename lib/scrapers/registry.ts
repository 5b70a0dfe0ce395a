import { isSourceId, type SourceId } from "@/types";
import type { Scraper } from "./types";

const scrapers = new Map<SourceId, Scraper>();

/** First registration per source id wins; registering again is a no-op. */
export function registerScraper(scraper: Scraper): void {
  if (scrapers.has(scraper.id)) return;
  scrapers.set(scraper.id, scraper);
}

/** Registered scrapers in registration order. */
export function getScrapers(): Scraper[] {
  return [...scrapers.values()];
}

export function getScraperById(id: string): Scraper | undefined {
  return isSourceId(id) ? scrapers.get(id) : undefined;
}

/**
 * Scrapers for the given ids, in the order given and without repeats; every
 * registered scraper when `ids` is empty. Throws on an unknown id.
 */
export function selectScrapers(ids: readonly string[] = []): Scraper[] {
  if (ids.length === 0) return getScrapers();
  const selected = new Map<SourceId, Scraper>();
  for (const id of ids) {
    const scraper = getScraperById(id.trim().toLowerCase());
    if (!scraper) {
      const known = [...scrapers.keys()].join(", ");
      throw new Error(`Unknown source "${id}" (known: ${known})`);
    }
    selected.set(scraper.id, scraper);
  }
  return [...selected.values()];
}
