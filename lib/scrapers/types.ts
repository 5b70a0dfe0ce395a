import type { SourceId } from "@/types";

/**
 * Raw hackathon as returned by a scraper before normalization.
 * Dates can be ISO dates/datetimes or Date; normalization converts them to calendar days in FEED_TIMEZONE.
 */
export interface RawHackathon {
  title: string;
  url: string;
  startDate: string | Date | null;
  endDate?: string | Date | null;
  location?: string | null;
  /** Set when the source itself flags the event as online-only. */
  online?: boolean;
  raw?: Record<string, unknown>;
}

/** What a parser needs to place yearless or zoned dates: the run's clock and feed timezone. */
export interface ParseContext {
  now: Date;
  timeZone: string;
}

export interface Scraper {
  id: SourceId;
  name: string;
  /** Fetch HTML or JSON text (or multiple pages folded into one document) for the source. */
  fetch(): Promise<string>;
  /** Parse content into raw hackathons. Throws ParseError when the structure is not recognized. */
  parse(content: string, ctx?: ParseContext): RawHackathon[] | Promise<RawHackathon[]>;
}
