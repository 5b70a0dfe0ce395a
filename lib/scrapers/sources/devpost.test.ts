import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { devpostScraper } from "./devpost";
import { FetchError, ParseError } from "../errors";

const API_JSON = readFileSync(join(__dirname, "devpost-api-fixture.json"), "utf-8");
const LISTING_HTML = readFileSync(join(__dirname, "devpost-listing-fixture.html"), "utf-8");

async function parse(content: string) {
  return Promise.resolve(devpostScraper.parse(content));
}

describe("Devpost scraper", () => {
  const fetchMock = vi.fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.stubEnv("DEVPOST_API_BASE", "https://devpost.example.com/");
    vi.stubEnv("DEVPOST_MAX_PAGES", "5");
    vi.stubEnv("FETCH_RETRY_DELAY_MS", "0");
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("parses the API payload and skips malformed entries", async () => {
    const events = await parse(API_JSON);
    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({
      title: "Example Hack",
      url: "https://example-hack.devpost.com/",
      startDate: "2027-01-10",
      endDate: "2027-02-20",
      location: "Online",
    });
    expect(events[1]).toMatchObject({
      title: "City Builders Jam",
      startDate: "2026-12-20",
      endDate: "2027-01-05",
      location: "Berlin, Germany",
    });
    expect(console.warn).toHaveBeenCalledWith("[devpost] skipped 1 malformed API entries");
  });

  it("parses the rendered listing page", async () => {
    const events = await parse(LISTING_HTML);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      title: "Tile One Hack",
      url: "https://tile-one.devpost.com/",
      startDate: "2027-03-01",
      endDate: "2027-03-31",
      location: "Online",
    });
  });

  it("rejects payloads it does not recognize", async () => {
    await expect(parse('{"error":"maintenance"}')).rejects.toThrow("devpost: expected a hackathons array");
    await expect(parse("{not json")).rejects.toThrow("devpost: response is not valid JSON");
    await expect(parse("<html><body></body></html>")).rejects.toBeInstanceOf(ParseError);
  });

  it("walks API pages until total_count is reached", async () => {
    const page1 = { hackathons: [{ title: "A" }, { title: "B" }], meta: { total_count: 3 } };
    const page2 = { hackathons: [{ title: "C" }], meta: { total_count: 3 } };
    fetchMock
      .mockResolvedValueOnce(new Response(JSON.stringify(page1)))
      .mockResolvedValueOnce(new Response(JSON.stringify(page2)));

    const body = JSON.parse(await devpostScraper.fetch());
    expect(body.hackathons).toHaveLength(3);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      "https://devpost.example.com/api/hackathons?status[]=upcoming&status[]=open&page=2"
    );
  });

  it("stops at an empty page", async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ hackathons: [], meta: { total_count: 40 } })));
    const body = JSON.parse(await devpostScraper.fetch());
    expect(body).toEqual({ hackathons: [] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("surfaces a refused API when the browser fallback is off", async () => {
    vi.stubEnv("SCRAPE_BROWSER_FALLBACK", "false");
    fetchMock.mockImplementation(() => Promise.resolve(new Response("", { status: 403 })));
    const err = await devpostScraper.fetch().catch((e: unknown) => e);
    expect(err instanceof FetchError && err.kind).toBe("blocked");
  });
});
