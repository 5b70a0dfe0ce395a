import * as cheerio from "cheerio";
import { z } from "zod";
import { getDevpostApiBase, getDevpostMaxPages, isBrowserFallbackEnabled } from "@/lib/config";
import type { Scraper, RawHackathon, ParseContext } from "../types";
import { FetchError, ParseError } from "../errors";
import { fetchJsonText } from "../fetchHtml";
import { fetchWithPlaywrightAutoScroll } from "../fetchPlaywright";
import { parseDateRange } from "../dateText";
import { absoluteUrl, cleanText, defaultParseContext, safeJsonParse } from "../html";

const SOURCE_ID = "devpost";
const STATUS_QUERY = "status[]=upcoming&status[]=open";

const apiPageSchema = z.object({
  hackathons: z.array(z.unknown()),
  meta: z.object({ total_count: z.number().nullish() }).nullish(),
});

const apiHackathonSchema = z.object({
  title: z.string(),
  url: z.string(),
  submission_period_dates: z.string().nullish(),
  displayed_location: z.object({ location: z.string().nullish() }).nullish(),
  open_state: z.string().nullish(),
});

/**
 * Walk the JSON API's pages and fold them into one `{ hackathons: [...] }` document.
 * A first page that doesn't look like the API is returned as-is so parse() can reject it.
 */
async function fetchApiPages(base: string): Promise<string> {
  const hackathons: unknown[] = [];
  const maxPages = getDevpostMaxPages();

  for (let page = 1; page <= maxPages; page++) {
    const body = await fetchJsonText(`${base}/api/hackathons?${STATUS_QUERY}&page=${page}`);
    const parsed = apiPageSchema.safeParse(safeJsonParse(body));
    if (!parsed.success) {
      if (page === 1) return body;
      console.warn(`[devpost] page ${page} is not an API page, stopping`);
      break;
    }
    hackathons.push(...parsed.data.hackathons);
    const total = parsed.data.meta?.total_count ?? 0;
    if (parsed.data.hackathons.length === 0 || hackathons.length >= total) break;
  }

  return JSON.stringify({ hackathons });
}

function parseApiJson(text: string, ctx: ParseContext): RawHackathon[] {
  const data = safeJsonParse(text);
  if (data === undefined) throw new ParseError(SOURCE_ID, "response is not valid JSON");
  const page = apiPageSchema.safeParse(data);
  if (!page.success) throw new ParseError(SOURCE_ID, "expected a hackathons array");

  const events: RawHackathon[] = [];
  let skipped = 0;
  for (const item of page.data.hackathons) {
    const parsed = apiHackathonSchema.safeParse(item);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    const h = parsed.data;
    const range = parseDateRange(h.submission_period_dates, ctx.now, ctx.timeZone);
    events.push({
      title: h.title,
      url: h.url,
      startDate: range?.start ?? null,
      endDate: range?.end ?? null,
      location: h.displayed_location?.location ?? null,
      raw: {
        submissionPeriod: h.submission_period_dates ?? null,
        openState: h.open_state ?? null,
      },
    });
  }
  if (skipped > 0) console.warn(`[devpost] skipped ${skipped} malformed API entries`);
  return events;
}

/** Rendered listing page (browser fallback): one `.hackathon-tile` per hackathon. */
function parseListingHtml(html: string, base: string, ctx: ParseContext): RawHackathon[] {
  const $ = cheerio.load(html);
  const tiles = $(".hackathon-tile");
  if (!tiles.length) throw new ParseError(SOURCE_ID, "no .hackathon-tile elements on listing page");

  const events: RawHackathon[] = [];
  tiles.each((_, el) => {
    const $tile = $(el);
    const url = absoluteUrl($tile.find("a.tile-anchor, a[href]").first().attr("href"), base);
    const title = cleanText($tile.find("h3").first().text());
    if (!url || !title) return;

    const period = cleanText($tile.find(".submission-period").first().text());
    const range = parseDateRange(period, ctx.now, ctx.timeZone);
    const location = cleanText($tile.find(".info-with-icon .info").first().text()) || null;

    events.push({
      title,
      url,
      startDate: range?.start ?? null,
      endDate: range?.end ?? null,
      location,
      raw: { submissionPeriod: period || null },
    });
  });
  return events;
}

export const devpostScraper: Scraper = {
  id: SOURCE_ID,
  name: "Devpost",

  async fetch() {
    const base = getDevpostApiBase();
    try {
      return await fetchApiPages(base);
    } catch (e) {
      if (e instanceof FetchError && e.kind === "blocked" && isBrowserFallbackEnabled()) {
        console.warn(`[devpost] API refused (${e.message}), rendering the listing page instead`);
        return fetchWithPlaywrightAutoScroll(`${base}/hackathons?${STATUS_QUERY}`, {
          stabilizeSelector: ".hackathon-tile",
        });
      }
      throw e;
    }
  },

  parse(content: string, ctx?: ParseContext): RawHackathon[] {
    const context = defaultParseContext(ctx);
    const trimmed = content.trimStart();
    if (trimmed.startsWith("{") || trimmed.startsWith("[")) return parseApiJson(trimmed, context);
    return parseListingHtml(content, getDevpostApiBase(), context);
  },
};
