import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { FetchError } from "./errors";
import { fetchJsonText, fetchText } from "./fetchHtml";

const URL_UNDER_TEST = "https://listings.example.com/hackathons";

function respond(status: number, body = "") {
  return () => Promise.resolve(new Response(body, { status }));
}

describe("fetchText", () => {
  const fetchMock = vi.fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("returns the body and sends a browser user-agent", async () => {
    fetchMock.mockImplementation(respond(200, "<html>ok</html>"));
    await expect(fetchText(URL_UNDER_TEST, { retryDelayMs: 0 })).resolves.toBe("<html>ok</html>");
    const init = fetchMock.mock.calls[0]?.[1];
    const headers = new Headers(init?.headers);
    expect(headers.get("User-Agent")).toContain("Mozilla/5.0");
  });

  it("retries a 503 and returns the later success", async () => {
    fetchMock.mockImplementationOnce(respond(503)).mockImplementationOnce(respond(200, "second"));
    await expect(fetchText(URL_UNDER_TEST, { attempts: 3, retryDelayMs: 0 })).resolves.toBe("second");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry a 404", async () => {
    fetchMock.mockImplementation(respond(404));
    const err = await fetchText(URL_UNDER_TEST, { attempts: 3, retryDelayMs: 0 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err instanceof FetchError && [err.kind, err.status, err.attempts]).toEqual(["http", 404, 1]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports a 403 as blocked", async () => {
    fetchMock.mockImplementation(respond(403));
    const err = await fetchText(URL_UNDER_TEST, { retryDelayMs: 0 }).catch((e: unknown) => e);
    expect(err instanceof FetchError && err.kind).toBe("blocked");
  });

  it("gives up on network errors after the last attempt", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const err = await fetchText(URL_UNDER_TEST, { attempts: 2, retryDelayMs: 0 }).catch((e: unknown) => e);
    expect(err instanceof FetchError && [err.kind, err.attempts]).toEqual(["network", 2]);
    expect(err instanceof FetchError && err.message).toBe(`fetch failed: ${URL_UNDER_TEST}`);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("asks for JSON in fetchJsonText", async () => {
    fetchMock.mockImplementation(respond(200, "{}"));
    await fetchJsonText(URL_UNDER_TEST, { retryDelayMs: 0 });
    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.get("Accept")).toBe("application/json,text/plain,*/*");
  });
});
