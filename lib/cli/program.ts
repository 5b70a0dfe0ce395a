import { Command, InvalidArgumentError } from "commander";
import { getScrapers, selectScrapers } from "@/lib/scrapers/registry";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import { FeedWriteError } from "@/lib/scrapers/errors";
import { normalizeEvent } from "@/lib/normalize/normalizeEvent";
import { runScrape, type ScrapeRunResult } from "@/lib/pipeline/runScrape";
import { readFeed, toFeedRecord } from "@/lib/feed/feedFile";
import { filterOnline, formatEventLine, upcomingWithin } from "@/lib/feed/feedQuery";
import { startScrapeSchedule } from "@/lib/scheduler/scheduleScrape";
import { getFeedPath, getFeedTimeZone } from "@/lib/config";

registerAllScrapers();

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

export function printSummary(result: ScrapeRunResult): void {
  for (const r of result.results) {
    const status = r.errors.length ? ` (${r.errors.length} errors)` : "";
    console.error(`[scrape] ${r.sourceId}: ${r.count}/${r.rawCount} kept${status}`);
  }
  const target = result.written ? `written to ${result.outPath}` : "dry run, nothing written";
  console.error(`[scrape] ${result.events.length} events in feed, ${target}`);
}

async function scrapeOnce(opts: { source?: string[]; out?: string; dryRun?: boolean }): Promise<void> {
  const result = await runScrape({
    scrapers: selectScrapers(opts.source),
    outPath: opts.out,
    dryRun: opts.dryRun,
  });
  printSummary(result);
  if (result.dryRun) {
    console.log(JSON.stringify(result.events.map(toFeedRecord), null, 2));
  }
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name("hackathon-feed")
    .description("Scrape hackathon listings into one JSON feed for the community bot");

  program
    .command("scrape")
    .description("Fetch every source once and rewrite the feed")
    .option("-s, --source <id...>", "only these sources (curated, devpost, mlh)")
    .option("-o, --out <path>", "feed path (default HACKATHONS_FEED_PATH)")
    .option("--dry-run", "print the feed instead of writing it")
    .action(async (opts: { source?: string[]; out?: string; dryRun?: boolean }) => {
      try {
        await scrapeOnce(opts);
      } catch (e) {
        if (!(e instanceof FeedWriteError)) throw e;
        console.error(`[scrape] ${e.message}`);
        process.exitCode = 1;
      }
    });

  program
    .command("sources")
    .description("List the registered sources")
    .action(() => {
      for (const s of getScrapers()) console.log(`${s.id}\t${s.name}`);
    });

  program
    .command("preview")
    .description("Fetch and parse one source without writing anything")
    .argument("<source>", "source id")
    .option("-n, --limit <n>", "records to print", parsePositiveInt, 5)
    .action(async (sourceId: string, opts: { limit: number }) => {
      const [scraper] = selectScrapers([sourceId]);
      const timeZone = getFeedTimeZone();
      const content = await scraper.fetch();
      const rawList = await Promise.resolve(scraper.parse(content, { now: new Date(), timeZone }));
      console.error(`[preview] ${scraper.id}: ${rawList.length} raw records`);
      for (const raw of rawList.slice(0, opts.limit)) {
        const { raw: _details, ...fields } = raw;
        console.log(JSON.stringify(fields));
        try {
          console.log(`  -> ${formatEventLine(normalizeEvent(raw, scraper.id, timeZone))}`);
        } catch (e) {
          console.log(`  -> skipped: ${e instanceof Error ? e.message : String(e)}`);
        }
      }
    });

  program
    .command("list")
    .description("Print the feed")
    .option("-f, --feed <path>", "feed path (default HACKATHONS_FEED_PATH)")
    .option("--online", "online events only")
    .option("-d, --days <n>", "only events starting within n days", parsePositiveInt)
    .option("-n, --limit <n>", "maximum events to print", parsePositiveInt)
    .action(async (opts: { feed?: string; online?: boolean; days?: number; limit?: number }) => {
      let events = await readFeed(opts.feed ?? getFeedPath());
      if (opts.online) events = filterOnline(events);
      if (opts.days != null) events = upcomingWithin(events, opts.days, new Date(), getFeedTimeZone());
      if (opts.limit != null) events = events.slice(0, opts.limit);
      for (const event of events) console.log(formatEventLine(event));
    });

  program
    .command("schedule")
    .description("Scrape on a cron schedule until interrupted")
    .option("-c, --cron <expr>", "cron expression (default SCRAPE_CRON)")
    .action((opts: { cron?: string }) => {
      const schedule = startScrapeSchedule(
        async () => printSummary(await runScrape()),
        { cronExpression: opts.cron }
      );
      const shutdown = (signal: string) => {
        console.error(`[schedule] ${signal} received`);
        schedule.stop();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  return program;
}
