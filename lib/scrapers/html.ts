import { getFeedTimeZone } from "@/lib/config";
import type { ParseContext } from "./types";

/** Collapse runs of whitespace (newlines from markup included) to single spaces. */
export function cleanText(text: string | null | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/** Resolve a possibly relative href against the page it came from; null if unusable. */
export function absoluteUrl(href: string | null | undefined, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href.trim(), base).toString();
  } catch {
    return null;
  }
}

export function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** The context a parser uses when the caller gives none: now, in FEED_TIMEZONE. */
export function defaultParseContext(ctx?: ParseContext): ParseContext {
  return ctx ?? { now: new Date(), timeZone: getFeedTimeZone() };
}
