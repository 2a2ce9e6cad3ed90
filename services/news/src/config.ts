import "dotenv/config";
import {
  CAMPAIGN_START_DATE,
  parseCalendarDate,
  todayInTimeZone,
} from "./dateCalculator";
import { DEFAULT_KEYWORD } from "./articleSelector";
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_TIMEOUT_MS,
  GUARDIAN_BASE_URL,
} from "./guardian.client";
import type { CalendarDate } from "./types";

export type PastNewsConfig = {
  guardianApiKey: string;
  guardianBaseUrl: string;
  pageSize: number;
  timeoutMs: number;
  keyword: string;
  earliestDate: CalendarDate;
  timeZone: string;
  port: number;
};

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env): PastNewsConfig {
  const earliestDate = env.PAST_NEWS_EARLIEST_DATE?.trim() || CAMPAIGN_START_DATE;
  parseCalendarDate(earliestDate);

  const timeZone = env.PAST_NEWS_TIMEZONE?.trim() || "UTC";
  // throws RangeError for an unknown zone
  todayInTimeZone(timeZone);

  return {
    guardianApiKey: env.GUARDIAN_API_KEY?.trim() ?? "",
    guardianBaseUrl: env.GUARDIAN_BASE_URL?.trim() || GUARDIAN_BASE_URL,
    pageSize: positiveInt(env.GUARDIAN_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    timeoutMs: positiveInt(env.GUARDIAN_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    keyword: env.PAST_NEWS_KEYWORD?.trim() || DEFAULT_KEYWORD,
    earliestDate,
    timeZone,
    port: positiveInt(env.PORT, 5001),
  };
}
