/**
 * Headline-gated article selection.
 *
 * Gate: an article is eligible only if its headline contains the subject
 * keyword (case-insensitive). Body mentions never get an article past the gate.
 *
 * Rank: eligible articles are ranked by keyword count in the body text; ties
 * keep API order, so the first maximal candidate wins.
 */

import * as cheerio from "cheerio";
import type {
  Article,
  CalendarDate,
  QuietDay,
  SelectedArticle,
} from "./types";

export const DEFAULT_KEYWORD = "Trump";
export const EXCERPT_PARAGRAPHS = 3;

// plain text may carry stray "<...>"; only block markup marks an HTML body
const HTML_BLOCK = /<\/?(p|div|h[1-6]|blockquote|ul|ol|li|figure|figcaption|br)\b/i;
const BLANK_LINE = /\n\s*\n/;

export function quietDayMessage(keyword: string): string {
  return `No ${keyword} coverage found on this day`;
}

export function headlineMatches(headline: string, keyword: string): boolean {
  if (!keyword) return false;
  return headline.toLowerCase().includes(keyword.toLowerCase());
}

/** Non-overlapping, case-insensitive occurrences of `keyword` in `text`. */
export function countMentions(text: string, keyword: string): number {
  if (!text || !keyword) return 0;

  const haystack = text.toLowerCase();
  const needle = keyword.toLowerCase();
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Paragraphs of an article body as plain text. HTML bodies split on `<p>`
 * elements; plain text splits on blank lines.
 */
export function splitParagraphs(body: string): string[] {
  if (!body.trim()) return [];

  if (HTML_BLOCK.test(body)) {
    const $ = cheerio.load(body, null, false);
    const tagged = $("p")
      .toArray()
      .map((el) => $(el).text().trim())
      .filter((p) => p.length > 0);
    if (tagged.length > 0) return tagged;

    return splitPlainText($.root().text());
  }

  return splitPlainText(body);
}

/** Full text of an article body, including headings, quotes and captions. */
export function bodyText(body: string): string {
  if (!HTML_BLOCK.test(body)) return body;
  return cheerio.load(body, null, false).root().text();
}

function splitPlainText(text: string): string[] {
  return text
    .trim()
    .split(BLANK_LINE)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function buildExcerpt(
  paragraphs: string[],
  maxParagraphs = EXCERPT_PARAGRAPHS
): string {
  return paragraphs.slice(0, maxParagraphs).join("\n\n");
}

export function selectArticle(
  candidates: readonly Article[],
  targetDate: CalendarDate,
  keyword: string = DEFAULT_KEYWORD
): SelectedArticle | QuietDay {
  let best: { article: Article; mentions: number } | null = null;

  for (const article of candidates) {
    if (!headlineMatches(article.headline, keyword)) continue;

    const mentions = countMentions(bodyText(article.body), keyword);

    // strict ">" keeps the earliest candidate on ties
    if (best === null || mentions > best.mentions) {
      best = { article, mentions };
    }
  }

  if (best === null) {
    return { kind: "quiet", targetDate, message: quietDayMessage(keyword) };
  }

  const { article } = best;
  return {
    kind: "article",
    targetDate,
    article: {
      headline: article.headline,
      excerpt: buildExcerpt(splitParagraphs(article.body)) || article.headline,
      url: article.url,
      published: article.published,
    },
  };
}
