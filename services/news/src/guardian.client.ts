import { z } from "zod";
import {
  RateLimitedError,
  UnauthorizedError,
  UnavailableError,
} from "./errors";
import type { Article, CalendarDate, SearchArticles } from "./types";

export const GUARDIAN_BASE_URL = "https://content.guardianapis.com";
export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_TIMEOUT_MS = 10_000;

export type GuardianClientOptions = {
  apiKey: string;
  baseUrl?: string;
  pageSize?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type GuardianClient = {
  search: SearchArticles;
};

const GuardianResultSchema = z.object({
  webTitle: z.string(),
  webUrl: z.string(),
  webPublicationDate: z.string(),
  fields: z
    .object({
      headline: z.string().optional(),
      body: z.string().optional(),
    })
    .optional(),
});

const GuardianSearchSchema = z.object({
  response: z.object({
    status: z.string(),
    results: z.array(GuardianResultSchema).default([]),
  }),
});

type GuardianResult = z.infer<typeof GuardianResultSchema>;

function toArticle(r: GuardianResult): Article {
  return {
    headline: r.fields?.headline || r.webTitle,
    body: r.fields?.body ?? "",
    url: r.webUrl,
    published: r.webPublicationDate,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function buildSearchUrl(
  baseUrl: string,
  keyword: string,
  targetDate: CalendarDate,
  pageSize: number,
  apiKey: string
): string {
  const params = new URLSearchParams({
    q: keyword,
    "from-date": targetDate,
    "to-date": targetDate,
    "page-size": String(pageSize),
    "show-fields": "body,headline",
    "api-key": apiKey,
  });
  return `${baseUrl.replace(/\/+$/, "")}/search?${params}`;
}

/**
 * Guardian Open Platform content search, bounded to a single publication day.
 *
 * Every failure is reported as one of RateLimitedError, UnauthorizedError or
 * UnavailableError; an empty result set is a normal return.
 */
export function createGuardianClient(opts: GuardianClientOptions): GuardianClient {
  const baseUrl = opts.baseUrl ?? GUARDIAN_BASE_URL;
  const pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = opts.fetchImpl ?? fetch;

  async function search(
    keyword: string,
    targetDate: CalendarDate
  ): Promise<Article[]> {
    if (!opts.apiKey) {
      throw new UnauthorizedError("GUARDIAN_API_KEY is not set");
    }

    const url = buildSearchUrl(baseUrl, keyword, targetDate, pageSize, opts.apiKey);

    let res: Response;
    try {
      res = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      console.warn(`[news] Guardian request failed: ${errorMessage(err)}`);
      throw new UnavailableError(
        `Network error while contacting the Guardian API: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    if (res.status === 429) {
      await res.body?.cancel();
      throw new RateLimitedError(
        "Guardian API rate limit exceeded (300 calls per day)"
      );
    }
    if (res.status === 401 || res.status === 403) {
      await res.body?.cancel();
      throw new UnauthorizedError(
        `Guardian API rejected the API key (${res.status})`
      );
    }
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      console.warn(`[news] Guardian API error ${res.status}: ${text.slice(0, 200)}`);
      throw new UnavailableError(`Guardian API returned error ${res.status}`, {
        status: res.status,
      });
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new UnavailableError("Guardian API returned a non-JSON body", {
        status: res.status,
        cause: err,
      });
    }

    const parsed = GuardianSearchSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UnavailableError("Guardian API returned an unexpected body", {
        status: res.status,
        cause: parsed.error,
      });
    }
    if (parsed.data.response.status !== "ok") {
      throw new UnavailableError(
        `Guardian API returned status "${parsed.data.response.status}"`,
        { status: res.status }
      );
    }

    return parsed.data.response.results.map(toArticle);
  }

  return { search };
}
