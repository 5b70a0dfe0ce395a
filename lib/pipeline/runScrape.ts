import type { HackathonEvent } from "@/types";
import type { ParseContext, Scraper } from "@/lib/scrapers/types";
import { getScrapers } from "@/lib/scrapers/registry";
import { normalizeEvent } from "@/lib/normalize/normalizeEvent";
import { mergeEvents } from "@/lib/merge/mergeEvents";
import { writeFeed } from "@/lib/feed/feedFile";
import { calendarDayInTimeZone } from "@/lib/scrapers/timezone";
import { getScrapeCutoffDate, getScrapeWindowDays } from "@/lib/scrapers/scrapeWindow";
import {
  getDedupeToleranceDays,
  getFeedMaxEvents,
  getFeedPath,
  getFeedTimeZone,
  getSourceTimeoutMs,
} from "@/lib/config";

export interface SourceResult {
  sourceId: string;
  sourceName: string;
  /** Records returned by parse(). */
  rawCount: number;
  /** Records that normalized and fell inside the scrape window. */
  count: number;
  errors: string[];
}

export interface ScrapeRunResult {
  /** Merged and capped feed, in feed order. */
  events: HackathonEvent[];
  results: SourceResult[];
  outPath: string;
  dryRun: boolean;
  written: boolean;
}

export interface ScrapeRunOptions {
  /** Defaults to every registered scraper. */
  scrapers?: Scraper[];
  now?: Date;
  outPath?: string;
  dryRun?: boolean;
  perSourceTimeoutMs?: number;
  windowDays?: number;
  maxEvents?: number;
  timeZone?: string;
  toleranceDays?: number;
}

interface SourceRun extends SourceResult {
  events: HackathonEvent[];
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function runScraper(
  scraper: Scraper,
  today: Date,
  cutoff: Date,
  ctx: ParseContext
): Promise<SourceRun> {
  const run: SourceRun = {
    sourceId: scraper.id,
    sourceName: scraper.name,
    rawCount: 0,
    count: 0,
    errors: [],
    events: [],
  };
  try {
    const content = await scraper.fetch();
    const rawList = await Promise.resolve(scraper.parse(content, ctx));
    run.rawCount = rawList.length;

    for (const raw of rawList) {
      try {
        const event = normalizeEvent(raw, scraper.id, ctx.timeZone);
        if (event.endDate < today || event.startDate > cutoff) continue; // outside scrape window
        run.events.push(event);
      } catch (e) {
        run.errors.push(`Event "${raw.title?.slice(0, 30)}": ${errorMessage(e)}`);
      }
    }
    run.count = run.events.length;
    if (run.errors.length > 0) {
      console.warn(
        `[scrape] ${scraper.id}: ${run.count} events, ${run.errors.length} errors`,
        run.errors.slice(0, 3)
      );
    }
  } catch (e) {
    run.errors.push(errorMessage(e));
    console.error(`[scrape] ${scraper.id} failed:`, e);
  }
  return run;
}

async function runWithTimeout(
  scraper: Scraper,
  timeoutMs: number,
  work: () => Promise<SourceRun>
): Promise<SourceRun> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Scraper timeout after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work(), timeout]);
  } catch (err) {
    console.warn(`[scrape] ${scraper.id} timed out or failed:`, err);
    return {
      sourceId: scraper.id,
      sourceName: scraper.name,
      rawCount: 0,
      count: 0,
      errors: [errorMessage(err)],
      events: [],
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * One scrape run: fetch and parse every source concurrently, normalize, keep events
 * between today and the window cutoff, merge, cap and write the feed.
 *
 * Per-source failures end up in `results[].errors`; only a failed feed write
 * (FeedWriteError) is thrown.
 */
export async function runScrape(opts: ScrapeRunOptions = {}): Promise<ScrapeRunResult> {
  const scrapers = opts.scrapers ?? getScrapers();
  const now = opts.now ?? new Date();
  const timeZone = opts.timeZone ?? getFeedTimeZone();
  const outPath = opts.outPath ?? getFeedPath();
  const dryRun = opts.dryRun ?? false;
  const timeoutMs = opts.perSourceTimeoutMs ?? getSourceTimeoutMs();
  const maxEvents = opts.maxEvents ?? getFeedMaxEvents();

  const today = calendarDayInTimeZone(now, timeZone);
  const cutoff = getScrapeCutoffDate(today, opts.windowDays ?? getScrapeWindowDays());

  const ctx: ParseContext = { now, timeZone };
  const settled = await Promise.allSettled(
    scrapers.map((s) => runWithTimeout(s, timeoutMs, () => runScraper(s, today, cutoff, ctx)))
  );
  const runs = settled.map((p, i): SourceRun =>
    p.status === "fulfilled"
      ? p.value
      : {
          sourceId: scrapers[i]?.id ?? "unknown",
          sourceName: scrapers[i]?.name ?? "unknown",
          rawCount: 0,
          count: 0,
          errors: [errorMessage(p.reason)],
          events: [],
        }
  );

  const merged = mergeEvents(
    runs.map((r) => r.events),
    { toleranceDays: opts.toleranceDays ?? getDedupeToleranceDays() }
  );
  const events = merged.slice(0, maxEvents);

  if (!dryRun) {
    await writeFeed(outPath, events);
  }

  const results = runs.map(({ events: _events, ...summary }) => summary);
  return { events, results, outPath, dryRun, written: !dryRun };
}
