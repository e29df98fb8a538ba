import type { CalendarDate } from "@/types";
import { isValidDate } from "./timezone";

const WEEKDAYS = new Set([
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
]);

const MONTHS: Record<string, number> = {
  january: 1, february: 2, march: 3, april: 4, may: 5, june: 6,
  july: 7, august: 8, september: 9, october: 10, november: 11, december: 12,
};

// "<Weekday> <dd>, <Month> <yyyy>"
const DATE_PATTERN = /^([a-z]+)\s+(\d{1,2}),\s+([a-z]+)\s+(\d{4})$/i;

/**
 * Parse a day cell title such as "Thursday 08, May 2025".
 *
 * Names match case-insensitively and the day may be one or two digits; runs of
 * whitespace separate the fields but none may lead or trail. The
 * weekday has to be a weekday name but isn't checked against the date itself.
 * Returns null for anything else, including dates that don't exist.
 */
export function parseCollectionDate(value: string): CalendarDate | null {
  const m = value.match(DATE_PATTERN);
  if (!m) return null;
  const [, weekday, dayText, monthName, yearText] = m;
  if (!WEEKDAYS.has(weekday.toLowerCase())) return null;
  const month = MONTHS[monthName.toLowerCase()];
  if (!month) return null;
  const date: CalendarDate = {
    year: Number.parseInt(yearText, 10),
    month,
    day: Number.parseInt(dayText, 10),
  };
  return isValidDate(date) ? date : null;
}

/** For ranges like "Monday 05, May 2025 - Tuesday 06, May 2025", keep the first date. */
export function firstDateOfRange(value: string): string {
  const idx = value.indexOf(" - ");
  return idx === -1 ? value : value.slice(0, idx).trim();
}
