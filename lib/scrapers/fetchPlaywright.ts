import * as cheerio from "cheerio";
import type { Browser } from "playwright-core";
import { getChromiumPath, isBrowserFallbackEnabled } from "@/lib/config";
import { FetchError } from "./errors";
import { fetchHtml, type FetchTextOptions } from "./fetchHtml";

async function launchBrowser(url: string): Promise<Browser> {
  try {
    const { chromium } = await import("playwright-core");
    const executablePath = getChromiumPath();
    // Without an explicit binary, use the locally installed Chrome; playwright-core never downloads one.
    return await chromium.launch(
      executablePath ? { headless: true, executablePath } : { headless: true, channel: "chrome" }
    );
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new FetchError("network", url, `Browser unavailable for ${url}: ${msg}`, { cause: e });
  }
}

function asFetchError(url: string, e: unknown): FetchError {
  if (e instanceof FetchError) return e;
  const msg = e instanceof Error ? e.message : String(e);
  return new FetchError("network", url, `Browser fetch failed for ${url}: ${msg}`, { cause: e });
}

/**
 * Fetch rendered HTML from a URL using a headless browser (for JS-rendered pages).
 * If `waitForSelector` is given, wait until it appears before reading the page.
 */
export async function fetchWithPlaywright(
  url: string,
  opts?: { timeoutMs?: number; waitForSelector?: string }
): Promise<string> {
  const timeoutMs = opts?.timeoutMs ?? 30_000;
  const browser = await launchBrowser(url);
  try {
    const page = await browser.newPage();
    await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });
    if (opts?.waitForSelector) {
      await page.waitForSelector(opts.waitForSelector, { timeout: timeoutMs });
    }
    return await page.content();
  } catch (e) {
    throw asFetchError(url, e);
  } finally {
    await browser.close();
  }
}

/**
 * Fetch rendered HTML and auto-scroll to load more content.
 * Devpost's listing loads further tiles as the page scrolls.
 */
export async function fetchWithPlaywrightAutoScroll(
  url: string,
  opts?: {
    timeoutMs?: number;
    maxScrolls?: number;
    scrollWaitMs?: number;
    /**
     * If provided, we stop scrolling once this selector's count stops increasing.
     * If omitted, we use document height changes as a weaker signal.
     */
    stabilizeSelector?: string;
  }
): Promise<string> {
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  const maxScrolls = opts?.maxScrolls ?? 10;
  const scrollWaitMs = opts?.scrollWaitMs ?? 1200;
  const stabilizeSelector = opts?.stabilizeSelector;

  const browser = await launchBrowser(url);
  try {
    const page = await browser.newPage();
    await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });

    let stableRounds = 0;
    for (let i = 0; i < maxScrolls; i++) {
      const before = stabilizeSelector
        ? await page.locator(stabilizeSelector).count()
        : await page.evaluate(() => document.body.scrollHeight);

      await page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
      await page.waitForTimeout(scrollWaitMs);

      const after = stabilizeSelector
        ? await page.locator(stabilizeSelector).count()
        : await page.evaluate(() => document.body.scrollHeight);

      if (after === before) stableRounds++;
      else stableRounds = 0;
      if (stableRounds >= 2) break;
    }

    return await page.content();
  } catch (e) {
    throw asFetchError(url, e);
  } finally {
    await browser.close();
  }
}

/**
 * Fetch static HTML first; if `readySelector` matches nothing (the page renders
 * client-side), render it in a browser when the fallback is enabled.
 */
export async function fetchHtmlWithBrowserFallback(
  url: string,
  opts: { readySelector: string; fetch?: FetchTextOptions; renderTimeoutMs?: number }
): Promise<string> {
  const html = await fetchHtml(url, opts.fetch);
  const $ = cheerio.load(html);
  if ($(opts.readySelector).length > 0) return html;

  if (!isBrowserFallbackEnabled()) {
    console.warn(`[fetch] ${url}: "${opts.readySelector}" not in static HTML and browser fallback is off`);
    return html;
  }
  console.warn(`[fetch] ${url}: "${opts.readySelector}" not in static HTML, rendering in browser`);
  return fetchWithPlaywright(url, {
    timeoutMs: opts.renderTimeoutMs,
    waitForSelector: opts.readySelector,
  });
}
