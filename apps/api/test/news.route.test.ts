import * as assert from "node:assert/strict";
import { handleNewsRequest } from "../src/routes/news";
import { DailyCache } from "../../../services/news/src/dailyCache";
import {
  InvalidRangeError,
  RateLimitedError,
  UnauthorizedError,
  UnavailableError,
} from "../../../services/news/src/errors";
import type { PastNewsService } from "../../../services/news/src/fetchPastNews";
import type { DateOption, PastNewsResult } from "../../../services/news/src/types";

function serviceReturning(
  impl: (option: DateOption) => Promise<PastNewsResult>
): { service: PastNewsService; options: DateOption[] } {
  const options: DateOption[] = [];
  const service: PastNewsService = {
    fetch: (option) => {
      options.push(option);
      return impl(option);
    },
    cache: new DailyCache(),
  };
  return { service, options };
}

function failing(err: unknown) {
  return serviceReturning(async () => {
    throw err;
  }).service;
}

const articleResult: PastNewsResult = {
  option: "one_week",
  targetDate: "2024-01-21",
  cached: true,
  outcome: {
    kind: "article",
    targetDate: "2024-01-21",
    article: {
      headline: "Trump holds rally",
      excerpt: "Trump arrived.",
      url: "https://example.com/rally",
      published: "2024-01-21T19:00:00Z",
    },
  },
};

// ── success shapes ───────────────────────────────────────────────────

{
  const { service, options } = serviceReturning(async () => articleResult);
  const res = await handleNewsRequest({ option: "one_week" }, service);

  assert.deepEqual(options, ["one_week"]);
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, {
    success: true,
    date: "2024-01-21",
    article: {
      headline: "Trump holds rally",
      excerpt: "Trump arrived.",
      url: "https://example.com/rally",
      published: "2024-01-21T19:00:00Z",
    },
    cached: true,
  });
}

{
  const { service } = serviceReturning(async (option) => ({
    option,
    targetDate: "2023-12-24",
    cached: false,
    outcome: {
      kind: "quiet",
      targetDate: "2023-12-24",
      message: "No Trump coverage found on this day",
    },
  }));
  const res = await handleNewsRequest({ option: "one_month" }, service);

  assert.equal(res.status, 200);
  assert.deepEqual(res.body, {
    success: true,
    date: "2023-12-24",
    article: null,
    message: "No Trump coverage found on this day",
    cached: false,
  });
}

// ── validation ───────────────────────────────────────────────────────

{
  const { service, options } = serviceReturning(async () => articleResult);
  const res = await handleNewsRequest({}, service);
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, {
    success: false,
    error: "Missing required parameter: option",
  });
  assert.equal(options.length, 0);
}

{
  const { service } = serviceReturning(async () => articleResult);
  const res = await handleNewsRequest({ option: "invalid" }, service);
  assert.equal(res.status, 400);
  assert.deepEqual(res.body, {
    success: false,
    error:
      "Invalid option: invalid. Must be one of: today, one_week, two_weeks, one_month, random",
  });
}

// ── error mapping ────────────────────────────────────────────────────

{
  const res = await handleNewsRequest({ option: "one_week" }, failing(new RateLimitedError()));
  assert.equal(res.status, 429);
  assert.deepEqual(res.body, {
    success: false,
    error: "API rate limit exceeded. Please try again later.",
  });
}

{
  const res = await handleNewsRequest(
    { option: "one_week" },
    failing(new UnauthorizedError("GUARDIAN_API_KEY is not set"))
  );
  assert.equal(res.status, 500);
  assert.deepEqual(res.body, {
    success: false,
    error: "Server configuration error: GUARDIAN_API_KEY is not set",
  });
}

{
  const res = await handleNewsRequest(
    { option: "today" },
    failing(new UnavailableError("Guardian API returned error 502", { status: 502 }))
  );
  assert.equal(res.status, 503);
  assert.deepEqual(res.body, {
    success: false,
    error: "Unable to fetch articles: Guardian API returned error 502",
  });
}

{
  const res = await handleNewsRequest(
    { option: "random" },
    failing(new InvalidRangeError("Date 2016-05-01 precedes the earliest searchable date 2016-05-26"))
  );
  assert.equal(res.status, 422);
  assert.deepEqual(res.body, {
    success: false,
    error: "Date 2016-05-01 precedes the earliest searchable date 2016-05-26",
  });
}

{
  const res = await handleNewsRequest({ option: "two_weeks" }, failing(new Error("boom")));
  assert.equal(res.status, 500);
  assert.deepEqual(res.body, { success: false, error: "Internal server error: boom" });
}

console.log("news.route.test.ts: ok");
