/** Calendar date as `YYYY-MM-DD`, no time-of-day. */
export type CalendarDate = string;

export const DATE_OPTIONS = [
  "today",
  "one_week",
  "two_weeks",
  "one_month",
  "random",
] as const;

export type DateOption = (typeof DATE_OPTIONS)[number];

// random results are recomputed on every request
export type CacheableOption = Exclude<DateOption, "random">;

export function isDateOption(value: unknown): value is DateOption {
  return DATE_OPTIONS.some((option) => option === value);
}

export function isCacheableOption(
  option: DateOption
): option is CacheableOption {
  return option !== "random";
}

export type Article = {
  headline: string;
  body: string;
  url: string;
  published: string;
};

export type ArticleSummary = {
  headline: string;
  excerpt: string;
  url: string;
  published: string;
};

export type SelectedArticle = {
  kind: "article";
  targetDate: CalendarDate;
  article: ArticleSummary;
};

export type QuietDay = {
  kind: "quiet";
  targetDate: CalendarDate;
  message: string;
};

export type CacheEntry = SelectedArticle | QuietDay;

export type PastNewsResult = {
  option: DateOption;
  targetDate: CalendarDate;
  cached: boolean;
  outcome: CacheEntry;
};

export type SearchArticles = (
  keyword: string,
  targetDate: CalendarDate
) => Promise<Article[]>;
