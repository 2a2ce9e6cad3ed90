export type PastNewsErrorCode =
  | "invalid_range"
  | "rate_limited"
  | "unauthorized"
  | "unavailable";

export class PastNewsError extends Error {
  readonly code: PastNewsErrorCode;

  constructor(code: PastNewsErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Random-date range is empty: today precedes the earliest allowed date. */
export class InvalidRangeError extends PastNewsError {
  constructor(message: string) {
    super("invalid_range", message);
  }
}

/** Failure surfaced by the search adapter. */
export class SearchError extends PastNewsError {}

export class RateLimitedError extends SearchError {
  constructor(message = "Search API rate limit exceeded") {
    super("rate_limited", message);
  }
}

export class UnauthorizedError extends SearchError {
  constructor(message = "Search API rejected the credential") {
    super("unauthorized", message);
  }
}

export class UnavailableError extends SearchError {
  readonly status: number | null;

  constructor(
    message: string,
    options: { status?: number | null; cause?: unknown } = {}
  ) {
    super("unavailable", message, { cause: options.cause });
    this.status = options.status ?? null;
  }
}
