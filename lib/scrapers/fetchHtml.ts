import { getFetchAttempts, getFetchRetryDelayMs, getFetchTimeoutMs } from "@/lib/config";
import { FetchError } from "./errors";

const UA =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface FetchTextOptions {
  timeoutMs?: number;
  /** Total tries, not retries. */
  attempts?: number;
  retryDelayMs?: number;
  accept?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function fetchOnce(url: string, timeoutMs: number, accept: string): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: {
        "User-Agent": UA,
        Accept: accept,
        "Accept-Language": "en-US,en;q=0.9",
      },
    });
    if (!res.ok) {
      throw FetchError.fromStatus(url, res.status);
    }
    return await res.text();
  } catch (e) {
    if (e instanceof FetchError) throw e;
    if (controller.signal.aborted) {
      throw new FetchError("timeout", url, `Timed out after ${timeoutMs}ms: ${url}`, { cause: e });
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new FetchError("network", url, `${msg}: ${url}`, { cause: e });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a URL as text with a browser user-agent, a per-request timeout and a
 * fixed number of attempts. Only transport errors, timeouts, 408, 429 and 5xx
 * are tried again. Throws FetchError.
 */
export async function fetchText(url: string, opts: FetchTextOptions = {}): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? getFetchTimeoutMs();
  const attempts = Math.max(1, opts.attempts ?? getFetchAttempts());
  const retryDelayMs = opts.retryDelayMs ?? getFetchRetryDelayMs();
  const accept = opts.accept ?? "text/html,application/xhtml+xml,*/*;q=0.8";

  let lastError: FetchError | null = null;
  let made = 0;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    made = attempt;
    try {
      return await fetchOnce(url, timeoutMs, accept);
    } catch (e) {
      if (!(e instanceof FetchError)) throw e;
      lastError = e;
      if (!e.retryable || attempt === attempts) break;
      console.warn(`[fetch] ${e.message} (attempt ${attempt}/${attempts}), retrying`);
      await sleep(retryDelayMs);
    }
  }

  if (!lastError) throw new FetchError("network", url, `No attempts made: ${url}`);
  throw new FetchError(lastError.kind, url, lastError.message, {
    status: lastError.status,
    attempts: made,
    cause: lastError.cause,
  });
}

/** Fetch HTML for a scraper's fetch(). */
export async function fetchHtml(url: string, opts: FetchTextOptions = {}): Promise<string> {
  return fetchText(url, opts);
}

/** Fetch a JSON endpoint; the body is returned as text for the scraper's parse(). */
export async function fetchJsonText(url: string, opts: FetchTextOptions = {}): Promise<string> {
  return fetchText(url, { accept: "application/json,text/plain,*/*", ...opts });
}
