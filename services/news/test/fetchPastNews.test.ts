import * as assert from "node:assert/strict";
import { DailyCache } from "../src/dailyCache";
import { fetchPastNews, type PastNewsDeps } from "../src/fetchPastNews";
import { InvalidRangeError, RateLimitedError } from "../src/errors";
import type { Article, CalendarDate } from "../src/types";

type SearchCall = { keyword: string; date: CalendarDate };

function makeDeps(
  overrides: Partial<PastNewsDeps> = {},
  articlesFor: (date: CalendarDate) => Article[] = () => []
) {
  const searches: SearchCall[] = [];
  const deps: PastNewsDeps = {
    search: async (keyword, date) => {
      searches.push({ keyword, date });
      return articlesFor(date);
    },
    cache: new DailyCache(),
    today: () => "2024-01-28",
    random: () => 0,
    keyword: "Trump",
    ...overrides,
  };
  return { deps, searches };
}

const rally: Article = {
  headline: "Trump holds rally",
  body: "Trump arrived.\n\nTrump spoke.\n\nTrump left.\n\nTrump tweeted.",
  url: "https://example.com/rally",
  published: "2024-01-21T19:00:00Z",
};

const local: Article = {
  headline: "Local election results",
  body: Array.from({ length: 10 }, () => "Trump").join(" "),
  url: "https://example.com/local",
  published: "2024-01-21T08:00:00Z",
};

// ── end-to-end: one_week on a Sunday ─────────────────────────────────

{
  const { deps, searches } = makeDeps({}, () => [local, rally]);
  const result = await fetchPastNews("one_week", deps);

  assert.deepEqual(searches, [{ keyword: "Trump", date: "2024-01-21" }]);
  assert.equal(result.option, "one_week");
  assert.equal(result.targetDate, "2024-01-21");
  assert.equal(result.cached, false);
  assert.deepEqual(result.outcome, {
    kind: "article",
    targetDate: "2024-01-21",
    article: {
      headline: "Trump holds rally",
      excerpt: "Trump arrived.\n\nTrump spoke.\n\nTrump left.",
      url: "https://example.com/rally",
      published: "2024-01-21T19:00:00Z",
    },
  });
}

// ── one_month resolves backward to the same weekday ──────────────────

{
  const { deps, searches } = makeDeps();
  const result = await fetchPastNews("one_month", deps);
  assert.equal(result.targetDate, "2023-12-24");
  assert.equal(searches[0].date, "2023-12-24");
  assert.equal(result.outcome.kind, "quiet");
}

// ── cache hits skip the search ───────────────────────────────────────

{
  const { deps, searches } = makeDeps({}, () => [rally]);
  const first = await fetchPastNews("two_weeks", deps);
  const second = await fetchPastNews("two_weeks", deps);

  assert.equal(searches.length, 1);
  assert.equal(first.cached, false);
  assert.equal(second.cached, true);
  assert.deepEqual(second.outcome, first.outcome);
}

{
  // quiet days are cached too
  const { deps, searches } = makeDeps({}, () => [local]);
  await fetchPastNews("one_week", deps);
  const again = await fetchPastNews("one_week", deps);
  assert.equal(searches.length, 1);
  assert.equal(again.outcome.kind, "quiet");
}

{
  // concurrent misses issue one search
  const { deps, searches } = makeDeps({}, () => [rally]);
  const [a, b] = await Promise.all([
    fetchPastNews("today", deps),
    fetchPastNews("today", deps),
  ]);
  assert.equal(searches.length, 1);
  assert.deepEqual(a.outcome, b.outcome);
}

// ── a new day invalidates ────────────────────────────────────────────

{
  let today = "2024-01-28";
  const { deps, searches } = makeDeps({ today: () => today }, () => [rally]);

  await fetchPastNews("one_week", deps);
  today = "2024-01-29";
  const next = await fetchPastNews("one_week", deps);

  assert.deepEqual(
    searches.map((s) => s.date),
    ["2024-01-21", "2024-01-22"]
  );
  assert.equal(next.cached, false);
  assert.equal(next.targetDate, "2024-01-22");
  assert.equal(deps.cache.day, "2024-01-29");
  assert.equal(deps.cache.size, 1);
}

// ── random is never cached ───────────────────────────────────────────

{
  const { deps, searches } = makeDeps({ random: () => 0 }, () => [rally]);
  const a = await fetchPastNews("random", deps);
  const b = await fetchPastNews("random", deps);

  assert.equal(a.targetDate, "2016-05-29");
  assert.equal(b.cached, false);
  assert.equal(searches.length, 2);
  assert.equal(deps.cache.size, 0);
}

{
  const { deps, searches } = makeDeps({
    today: () => "2016-05-01",
  });
  await assert.rejects(fetchPastNews("random", deps), InvalidRangeError);
  assert.equal(searches.length, 0);
}

// ── search errors propagate, nothing is cached ───────────────────────

{
  let calls = 0;
  const { deps } = makeDeps({
    search: async () => {
      calls++;
      throw new RateLimitedError();
    },
  });
  await assert.rejects(fetchPastNews("one_week", deps), RateLimitedError);
  await assert.rejects(fetchPastNews("one_week", deps), RateLimitedError);
  assert.equal(calls, 2);
  assert.equal(deps.cache.size, 0);
}

console.log("fetchPastNews.test.ts: ok");
