/**
 * Date Calculator — maps "today" + a DateOption to the target date to search.
 *
 * Option → target:
 *   today     → today
 *   one_week  → today - 7d
 *   two_weeks → today - 14d
 *   one_month → one calendar month back, then back to today's weekday
 *   random    → uniform pick among same-weekday dates since the campaign date
 *
 * All arithmetic runs on UTC midnights so no time-of-day or locale leaks in.
 */

import { InvalidRangeError } from "./errors";
import type { CalendarDate, DateOption } from "./types";

export const CAMPAIGN_START_DATE: CalendarDate = "2016-05-26";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

type DateParts = { year: number; month: number; day: number };

export type ResolveOptions = {
  /** Returns a float in [0, 1). */
  random?: () => number;
  earliestDate?: CalendarDate;
};

export function parseCalendarDate(value: CalendarDate): DateParts {
  const m = ISO_DATE.exec(value);
  if (!m) throw new RangeError(`Invalid calendar date: "${value}"`);

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    throw new RangeError(`Invalid calendar date: "${value}"`);
  }
  return { year, month, day };
}

function toUtcMs(value: CalendarDate): number {
  const { year, month, day } = parseCalendarDate(value);
  return utcMidnight(year, month - 1, day);
}

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear does not
function utcMidnight(year: number, monthIndex: number, day: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date.getTime();
}

function fromUtcMs(ms: number): CalendarDate {
  return new Date(ms).toISOString().slice(0, 10);
}

function formatParts({ year, month, day }: DateParts): CalendarDate {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function daysInMonth(year: number, month: number): number {
  // day 0 of the next month is the last day of this one
  return new Date(utcMidnight(year, month, 0)).getUTCDate();
}

export function addDays(value: CalendarDate, days: number): CalendarDate {
  return fromUtcMs(toUtcMs(value) + days * DAY_MS);
}

export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

/** ISO weekday: Monday = 1 … Sunday = 7. */
export function isoWeekday(value: CalendarDate): number {
  return new Date(toUtcMs(value)).getUTCDay() || 7;
}

/** Same day-of-month one month earlier, clamped to the end of that month. */
export function subtractCalendarMonth(value: CalendarDate): CalendarDate {
  const { year, month, day } = parseCalendarDate(value);
  const prevYear = month === 1 ? year - 1 : year;
  const prevMonth = month === 1 ? 12 : month - 1;
  return formatParts({
    year: prevYear,
    month: prevMonth,
    day: Math.min(day, daysInMonth(prevYear, prevMonth)),
  });
}

export function oneWeekAgo(today: CalendarDate): CalendarDate {
  return addDays(today, -7);
}

export function twoWeeksAgo(today: CalendarDate): CalendarDate {
  return addDays(today, -14);
}

export function oneMonthAgo(today: CalendarDate): CalendarDate {
  const naive = subtractCalendarMonth(today);
  const shift = (isoWeekday(naive) - isoWeekday(today) + 7) % 7;
  return addDays(naive, -shift);
}

/**
 * Uniform pick among all dates in [earliestDate, today] that share today's
 * weekday. Today itself is a candidate.
 */
export function randomSameWeekday(
  today: CalendarDate,
  random: () => number = Math.random,
  earliestDate: CalendarDate = CAMPAIGN_START_DATE
): CalendarDate {
  if (daysBetween(earliestDate, today) < 0) {
    throw new InvalidRangeError(
      `Date ${today} precedes the earliest searchable date ${earliestDate}`
    );
  }

  const lead = (isoWeekday(today) - isoWeekday(earliestDate) + 7) % 7;
  const first = addDays(earliestDate, lead);
  const count = Math.floor(daysBetween(first, today) / 7) + 1;

  const index = Math.min(count - 1, Math.max(0, Math.floor(random() * count)));
  return addDays(first, index * 7);
}

export function resolveTargetDate(
  option: DateOption,
  today: CalendarDate,
  opts: ResolveOptions = {}
): CalendarDate {
  switch (option) {
    case "today":
      return formatParts(parseCalendarDate(today));
    case "one_week":
      return oneWeekAgo(today);
    case "two_weeks":
      return twoWeeksAgo(today);
    case "one_month":
      return oneMonthAgo(today);
    case "random":
      return randomSameWeekday(today, opts.random, opts.earliestDate);
  }
}

/**
 * Today's calendar date in an IANA time zone. Default "today" provider.
 */
export function todayInTimeZone(
  timeZone: string,
  now: Date = new Date()
): CalendarDate {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((p) => p.type === type)?.value);

  return formatParts({ year: pick("year"), month: pick("month"), day: pick("day") });
}
