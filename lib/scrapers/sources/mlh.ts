import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { getMlhBaseUrl, getMlhSeason } from "@/lib/config";
import type { Scraper, RawHackathon, ParseContext } from "../types";
import { ParseError } from "../errors";
import { fetchHtmlWithBrowserFallback } from "../fetchPlaywright";
import { parseDateRange } from "../dateText";
import { absoluteUrl, cleanText, defaultParseContext } from "../html";

const SOURCE_ID = "mlh";
const CARD_SELECTOR = ".event-wrapper";

export function mlhEventsUrl(now = new Date()): string {
  return `${getMlhBaseUrl()}/seasons/${getMlhSeason(now)}/events`;
}

/** "Davis, CA" from the schema.org Place microdata inside a card. */
function locationFromCard($card: cheerio.Cheerio<AnyNode>): string | null {
  const $place = $card.find(".event-location").first();
  const parts = [
    cleanText($place.find('[itemprop="city"]').first().text()),
    cleanText($place.find('[itemprop="state"]').first().text()),
  ].filter(Boolean);
  if (parts.length) return parts.join(", ");
  return cleanText($place.text()) || null;
}

function parseCard(
  $: cheerio.CheerioAPI,
  el: AnyNode,
  base: string,
  ctx: ParseContext
): RawHackathon | null {
  const $card = $(el);
  const title = cleanText($card.find(".event-name").first().text());
  const $link = $card.find("a.event-link").first();
  const url = absoluteUrl($link.attr("href") ?? $card.find("a[href]").first().attr("href"), base);
  if (!title || !url) return null;

  const dateText = cleanText($card.find(".event-date").first().text());
  const metaStart = $card.find('meta[itemprop="startDate"]').attr("content")?.trim();
  const metaEnd = $card.find('meta[itemprop="endDate"]').attr("content")?.trim();
  const range = metaStart ? null : parseDateRange(dateText, ctx.now, ctx.timeZone);

  // "Digital Only", "In-Person Only" or "Hybrid: In-Person & Digital"
  const notes = cleanText($card.find(".event-hybrid-notes").first().text());
  const online = /\bdigital only\b|\bonline only\b/i.test(notes);

  return {
    title,
    url,
    startDate: metaStart || range?.start || null,
    endDate: metaEnd || range?.end || null,
    location: online ? null : locationFromCard($card),
    online,
    raw: { dateText: dateText || null, notes: notes || null },
  };
}

export const mlhScraper: Scraper = {
  id: SOURCE_ID,
  name: "Major League Hacking",

  async fetch() {
    return fetchHtmlWithBrowserFallback(mlhEventsUrl(), { readySelector: CARD_SELECTOR });
  },

  parse(html: string, ctx?: ParseContext): RawHackathon[] {
    const $ = cheerio.load(html);
    const cards = $(CARD_SELECTOR);
    if (!cards.length) throw new ParseError(SOURCE_ID, `no ${CARD_SELECTOR} cards on events page`);

    const base = getMlhBaseUrl();
    const context = defaultParseContext(ctx);
    const events: RawHackathon[] = [];
    const seen = new Set<string>();
    cards.each((_, el) => {
      const event = parseCard($, el, base, context);
      if (!event || seen.has(event.url)) return;
      seen.add(event.url);
      events.push(event);
    });
    return events;
  },
};
