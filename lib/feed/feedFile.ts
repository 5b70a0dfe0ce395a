import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import { SOURCE_IDS, type FeedRecord, type HackathonEvent } from "@/types";
import { FeedWriteError } from "@/lib/scrapers/errors";
import { calendarDay, toIsoDay } from "@/lib/scrapers/timezone";

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const feedRecordSchema = z.object({
  title: z.string().min(1),
  url: z.string().url(),
  start_date: isoDay,
  end_date: isoDay,
  location: z.string(),
  source: z.enum(SOURCE_IDS),
});

const feedSchema = z.array(feedRecordSchema);

export function toFeedRecord(event: HackathonEvent): FeedRecord {
  return {
    title: event.title,
    url: event.url,
    start_date: toIsoDay(event.startDate),
    end_date: toIsoDay(event.endDate),
    location: event.location,
    source: event.source,
  };
}

function dayFromIso(value: string): Date {
  const [y, m, d] = value.split("-").map(Number);
  const day = calendarDay(y, m, d);
  if (!day) throw new Error(`Invalid date in feed: ${value}`);
  return day;
}

export function fromFeedRecord(record: FeedRecord): HackathonEvent {
  return {
    title: record.title,
    url: record.url,
    startDate: dayFromIso(record.start_date),
    endDate: dayFromIso(record.end_date),
    location: record.location,
    source: record.source,
  };
}

export function serializeFeed(events: HackathonEvent[]): string {
  return `${JSON.stringify(events.map(toFeedRecord), null, 2)}\n`;
}

/** Parse and validate feed JSON. Throws on malformed content. */
export function parseFeed(content: string): HackathonEvent[] {
  const parsed = feedSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid feed at [${issue?.path.join(".") ?? ""}]: ${issue?.message ?? "unknown"}`);
  }
  return parsed.data.map(fromFeedRecord);
}

/**
 * Write the feed atomically: a temp file in the same directory is renamed over the
 * target, so the bot never reads a half-written file. Throws FeedWriteError.
 */
export async function writeFeed(path: string, events: HackathonEvent[]): Promise<void> {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, serializeFeed(events), "utf-8");
    await rename(tmpPath, path);
  } catch (e) {
    await rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
      console.warn(`[feed] Could not remove temp file ${tmpPath}:`, rmErr);
    });
    throw new FeedWriteError(path, e);
  }
}

export async function readFeed(path: string): Promise<HackathonEvent[]> {
  return parseFeed(await readFile(path, "utf-8"));
}
