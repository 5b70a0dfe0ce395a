import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { SourceId } from "@/types";
import type { RawHackathon, Scraper } from "@/lib/scrapers/types";
import { readFeed } from "@/lib/feed/feedFile";
import { runScrape } from "./runScrape";

const NOW = new Date("2026-10-18T12:00:00Z");

function fakeScraper(id: SourceId, records: RawHackathon[] | Error | "hang"): Scraper {
  return {
    id,
    name: `Fake ${id}`,
    fetch: () => {
      if (records instanceof Error) return Promise.reject(records);
      if (records === "hang") return new Promise<string>(() => {});
      return Promise.resolve(JSON.stringify(records));
    },
    parse: () => (Array.isArray(records) ? records : []),
  };
}

const BASE_OPTS = { now: NOW, timeZone: "UTC", windowDays: 365, maxEvents: 50, toleranceDays: 1 };

describe("runScrape", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "run-scrape-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the feed even when one source fails", async () => {
    const outPath = join(dir, "hackathons.json");
    const result = await runScrape({
      ...BASE_OPTS,
      outPath,
      scrapers: [
        fakeScraper("curated", [
          { title: "Campus Hack Night", url: "https://campus.example.org/", startDate: "2027-03-19" },
        ]),
        fakeScraper("devpost", new Error("HTTP 500: https://devpost.example.com/api/hackathons")),
        fakeScraper("mlh", [
          { title: "Valley Hacks", url: "https://valley.example.com/", startDate: "2027-02-13", endDate: "2027-02-15" },
        ]),
      ],
    });

    expect(result.written).toBe(true);
    expect(result.results.map((r) => [r.sourceId, r.count, r.errors])).toEqual([
      ["curated", 1, []],
      ["devpost", 0, ["HTTP 500: https://devpost.example.com/api/hackathons"]],
      ["mlh", 1, []],
    ]);
    const feed = await readFeed(outPath);
    expect(feed.map((e) => e.title)).toEqual(["Valley Hacks", "Campus Hack Night"]);
  });

  it("keeps only events between today and the window cutoff", async () => {
    const result = await runScrape({
      ...BASE_OPTS,
      dryRun: true,
      scrapers: [
        fakeScraper("devpost", [
          { title: "Ended Yesterday", url: "https://a.example.com/", startDate: "2026-10-10", endDate: "2026-10-17" },
          { title: "Ends Today", url: "https://b.example.com/", startDate: "2026-10-16", endDate: "2026-10-18" },
          { title: "Last Day In Window", url: "https://c.example.com/", startDate: "2027-10-18" },
          { title: "Too Far Out", url: "https://d.example.com/", startDate: "2027-10-19" },
        ]),
      ],
    });
    expect(result.events.map((e) => e.title)).toEqual(["Ends Today", "Last Day In Window"]);
    expect(result.results[0]).toMatchObject({ rawCount: 4, count: 2, errors: [] });
  });

  it("counts records that fail normalization as errors", async () => {
    const result = await runScrape({
      ...BASE_OPTS,
      dryRun: true,
      scrapers: [
        fakeScraper("mlh", [
          { title: "No date", url: "https://nodate.example.com/", startDate: null },
          { title: "Fine", url: "https://fine.example.com/", startDate: "2027-01-01" },
        ]),
      ],
    });
    expect(result.results[0]?.errors).toEqual(['Event "No date": Missing start date']);
    expect(result.events).toHaveLength(1);
  });

  it("times out a source that never answers", async () => {
    const result = await runScrape({
      ...BASE_OPTS,
      dryRun: true,
      perSourceTimeoutMs: 20,
      scrapers: [
        fakeScraper("devpost", "hang"),
        fakeScraper("mlh", [{ title: "Fine", url: "https://fine.example.com/", startDate: "2027-01-01" }]),
      ],
    });
    expect(result.results[0]?.errors).toEqual(["Scraper timeout after 20ms"]);
    expect(result.events.map((e) => e.source)).toEqual(["mlh"]);
  });

  it("merges across sources and caps the feed", async () => {
    const result = await runScrape({
      ...BASE_OPTS,
      dryRun: true,
      maxEvents: 2,
      scrapers: [
        fakeScraper("devpost", [
          { title: "Example Hack", url: "https://example-hack.devpost.com/", startDate: "2027-01-10", endDate: "2027-01-12" },
          { title: "Spring Jam", url: "https://spring.example.com/", startDate: "2027-04-01" },
        ]),
        fakeScraper("curated", [
          { title: "Example Hack 2027", url: "https://example-hack.example.com/", startDate: "2027-01-11" },
          { title: "Autumn Jam", url: "https://autumn.example.com/", startDate: "2026-11-01" },
        ]),
      ],
    });
    expect(result.events.map((e) => [e.title, e.source])).toEqual([
      ["Autumn Jam", "curated"],
      ["Example Hack 2027", "curated"],
    ]);
  });

  it("hands parsers the run's clock and timezone", async () => {
    const scraper = fakeScraper("mlh", []);
    const parse = vi.spyOn(scraper, "parse");
    await runScrape({ ...BASE_OPTS, timeZone: "Europe/Berlin", dryRun: true, scrapers: [scraper] });
    expect(parse).toHaveBeenCalledWith("[]", { now: NOW, timeZone: "Europe/Berlin" });
  });

  it("writes nothing on a dry run", async () => {
    const outPath = join(dir, "dry.json");
    const result = await runScrape({ ...BASE_OPTS, dryRun: true, outPath, scrapers: [] });
    expect(result).toMatchObject({ written: false, dryRun: true, events: [], results: [] });
    expect(existsSync(outPath)).toBe(false);
  });

  it("writes an empty feed when every source fails", async () => {
    const outPath = join(dir, "empty.json");
    await runScrape({ ...BASE_OPTS, outPath, scrapers: [fakeScraper("mlh", new Error("down"))] });
    expect(await readFile(outPath, "utf-8")).toBe("[]\n");
  });
});
