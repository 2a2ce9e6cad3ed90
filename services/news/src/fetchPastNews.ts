/**
 * fetchPastNews — entry point for one request.
 *
 * Pipeline:
 *   1. Read today from the injected clock
 *   2. Resolve the weekday-matched target date
 *   3. Check the daily cache (skipped for random)
 *   4. Search the target date
 *   5. Gate + rank candidates
 *   6. Cache the outcome (article or quiet day)
 *
 * Search errors propagate unchanged; nothing here retries.
 */

import { DailyCache } from "./dailyCache";
import { resolveTargetDate, todayInTimeZone } from "./dateCalculator";
import { selectArticle } from "./articleSelector";
import { createGuardianClient } from "./guardian.client";
import type { PastNewsConfig } from "./config";
import {
  isCacheableOption,
  type CacheEntry,
  type CalendarDate,
  type DateOption,
  type PastNewsResult,
  type SearchArticles,
} from "./types";

export type PastNewsDeps = {
  search: SearchArticles;
  cache: DailyCache;
  today: () => CalendarDate;
  random: () => number;
  keyword: string;
  earliestDate?: CalendarDate;
};

export type PastNewsService = {
  fetch: (option: DateOption) => Promise<PastNewsResult>;
  cache: DailyCache;
};

async function searchAndSelect(
  deps: PastNewsDeps,
  targetDate: CalendarDate
): Promise<CacheEntry> {
  const articles = await deps.search(deps.keyword, targetDate);
  const outcome = selectArticle(articles, targetDate, deps.keyword);
  console.log(
    `[news] ${targetDate}: ${articles.length} candidates → ${
      outcome.kind === "article" ? `"${outcome.article.headline}"` : "quiet day"
    }`
  );
  return outcome;
}

export async function fetchPastNews(
  option: DateOption,
  deps: PastNewsDeps
): Promise<PastNewsResult> {
  const today = deps.today();
  const targetDate = resolveTargetDate(option, today, {
    random: deps.random,
    earliestDate: deps.earliestDate,
  });

  if (!isCacheableOption(option)) {
    const outcome = await searchAndSelect(deps, targetDate);
    return { option, targetDate, cached: false, outcome };
  }

  const { entry, cached } = await deps.cache.getOrLoad(today, option, () =>
    searchAndSelect(deps, targetDate)
  );
  return { option, targetDate, cached, outcome: entry };
}

export function createPastNewsService(config: PastNewsConfig): PastNewsService {
  const client = createGuardianClient({
    apiKey: config.guardianApiKey,
    baseUrl: config.guardianBaseUrl,
    pageSize: config.pageSize,
    timeoutMs: config.timeoutMs,
  });
  const cache = new DailyCache();

  const deps: PastNewsDeps = {
    search: client.search,
    cache,
    today: () => todayInTimeZone(config.timeZone),
    random: Math.random,
    keyword: config.keyword,
    earliestDate: config.earliestDate,
  };

  return {
    fetch: (option) => fetchPastNews(option, deps),
    cache,
  };
}
