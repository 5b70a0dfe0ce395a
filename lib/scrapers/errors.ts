export type FetchErrorKind = "network" | "timeout" | "blocked" | "http";

/** Statuses that mean the site refused us rather than failed. */
const BLOCKED_STATUSES = new Set([401, 403, 429]);

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;
  readonly attempts: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    opts: { status?: number | null; attempts?: number; cause?: unknown } = {}
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = opts.status ?? null;
    this.attempts = opts.attempts ?? 1;
  }

  static fromStatus(url: string, status: number, attempts = 1): FetchError {
    const kind: FetchErrorKind = BLOCKED_STATUSES.has(status) ? "blocked" : "http";
    return new FetchError(kind, url, `HTTP ${status}: ${url}`, { status, attempts });
  }

  /** Retrying may help: transport failures, timeouts, 408, 429 and 5xx. */
  get retryable(): boolean {
    if (this.kind === "network" || this.kind === "timeout") return true;
    if (this.status == null) return false;
    return this.status === 408 || this.status === 429 || this.status >= 500;
  }
}

export class ParseError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, message: string, opts: { cause?: unknown } = {}) {
    super(`${sourceId}: ${message}`, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ParseError";
    this.sourceId = sourceId;
  }
}

export class FeedWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write feed to ${path}: ${detail}`, { cause });
    this.name = "FeedWriteError";
    this.path = path;
  }
}
