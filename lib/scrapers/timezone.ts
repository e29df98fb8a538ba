import { DEFAULT_TIMEZONE } from "@/types";
import type { CalendarDate } from "@/types";

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

/**
 * The calendar date `now` falls on in an IANA timezone.
 *
 * We avoid `date.getDate()` because that depends on the host's local TZ; a run
 * just after midnight in London on a UTC-5 box would still think it was yesterday.
 */
export function dateInTimeZone(now: Date, timeZone = DEFAULT_TIMEZONE): CalendarDate {
  const parts = getFormatter(timeZone).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find((p) => p.type === type)?.value ?? "", 10);
  return { year: get("year"), month: get("month"), day: get("day") };
}

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, "0");
}

/** YYYY-MM-DD */
export function toIsoDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/** Negative when `a` is before `b`, zero when equal. */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** True when year/month/day name a real day on the Gregorian calendar. */
export function isValidDate({ year, month, day }: CalendarDate): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const probe = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 to 1900-1999.
  probe.setUTCFullYear(year);
  return probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}
