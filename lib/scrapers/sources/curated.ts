import { readFile } from "node:fs/promises";
import { z } from "zod";
import { getCuratedSource } from "@/lib/config";
import type { Scraper, RawHackathon } from "../types";
import { ParseError } from "../errors";
import { fetchJsonText } from "../fetchHtml";
import { safeJsonParse } from "../html";

const SOURCE_ID = "curated";

/**
 * Hand-maintained entries, keyed like the feed itself so community members can copy
 * a feed record and edit it.
 */
const curatedEntrySchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  start_date: z.string().min(1),
  end_date: z.string().nullish(),
  location: z.string().nullish(),
  online: z.boolean().optional(),
});

const curatedListSchema = z.array(curatedEntrySchema);

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export const curatedScraper: Scraper = {
  id: SOURCE_ID,
  name: "Curated list",

  async fetch() {
    const location = getCuratedSource();
    if (/^https?:\/\//i.test(location)) return fetchJsonText(location);
    try {
      return await readFile(location, "utf-8");
    } catch (e) {
      if (!isMissingFile(e)) throw e;
      console.warn(`[curated] ${location} not found, no curated hackathons this run`);
      return "[]";
    }
  },

  parse(content: string): RawHackathon[] {
    const data = safeJsonParse(content);
    if (data === undefined) throw new ParseError(SOURCE_ID, "curated list is not valid JSON");
    const parsed = curatedListSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ParseError(
        SOURCE_ID,
        `invalid entry at [${issue?.path.join(".") ?? ""}]: ${issue?.message ?? "unknown"}`
      );
    }
    return parsed.data.map((entry) => ({
      title: entry.title,
      url: entry.url,
      startDate: entry.start_date,
      endDate: entry.end_date ?? null,
      location: entry.location ?? null,
      online: entry.online,
    }));
  },
};
