import type { CalendarDate, CollectionRecord } from "@/types";
import { DEFAULT_TIMEZONE } from "@/types";
import { toIsoDate } from "@/lib/scrapers/timezone";

export interface IcsCalendarOptions {
  productId: string;
  calendarName: string;
  timeZone?: string;
  /** Used for DTSTAMP; defaults to the current time. */
  now?: Date;
}

const MAX_LINE_OCTETS = 75;

function formatIcsDateTime(d: Date): string {
  return d.toISOString().replace(/[-:]/g, "").slice(0, 15) + "Z";
}

function formatIcsDate(date: CalendarDate): string {
  return toIsoDate(date).replace(/-/g, "");
}

function escapeIcsText(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/;/g, "\\;").replace(/,/g, "\\,").replace(/\r?\n/g, "\\n");
}

function slugify(s: string): string {
  return s.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "") || "collection";
}

/** Fold a content line to 75 octets, continuation lines starting with a space. */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, "utf8") <= MAX_LINE_OCTETS) return line;
  const out: string[] = [];
  let current = "";
  let currentOctets = 0;
  for (const ch of line) {
    const octets = Buffer.byteLength(ch, "utf8");
    // Continuation lines lose one octet to the leading space.
    const limit = out.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
    if (currentOctets + octets > limit) {
      out.push(current);
      current = "";
      currentOctets = 0;
    }
    current += ch;
    currentOctets += octets;
  }
  out.push(current);
  return out.join("\r\n ");
}

function hashText(s: string): string {
  let hash = 0;
  for (let i = 0; i < s.length; i++) {
    hash = (hash << 5) - hash + s.charCodeAt(i);
    hash |= 0;
  }
  return Math.abs(hash).toString(36);
}

/**
 * Same record, same UID on every run. The hash of the full label keeps labels
 * that slug alike apart; `occurrence` separates repeats of an identical record.
 */
export function eventUid(record: CollectionRecord, occurrence = 1): string {
  const base = `${formatIcsDate(record.date)}-${slugify(record.type)}-${hashText(record.type)}`;
  return occurrence > 1 ? `${base}-${occurrence}@bin-collection-calendar` : `${base}@bin-collection-calendar`;
}

/**
 * Build a single all-day VEVENT. No DTEND: a DATE start on its own is a one-day event.
 */
export function formatEventIcs(
  record: CollectionRecord,
  now: Date = new Date(),
  uid: string = eventUid(record)
): string[] {
  return [
    "BEGIN:VEVENT",
    `UID:${uid}`,
    `DTSTAMP:${formatIcsDateTime(now)}`,
    `DTSTART;VALUE=DATE:${formatIcsDate(record.date)}`,
    `SUMMARY:${escapeIcsText(record.type)}`,
    "TRANSP:TRANSPARENT",
    "END:VEVENT",
  ];
}

export function formatIcsCalendar(records: readonly CollectionRecord[], options: IcsCalendarOptions): string {
  const now = options.now ?? new Date();
  const header = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${options.productId}`,
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    `X-WR-CALNAME:${escapeIcsText(options.calendarName)}`,
    "X-WR-TIMEZONE:" + (options.timeZone ?? DEFAULT_TIMEZONE),
  ];
  const seen = new Map<string, number>();
  const vevents = records.flatMap((record) => {
    const key = eventUid(record);
    const occurrence = (seen.get(key) ?? 0) + 1;
    seen.set(key, occurrence);
    return formatEventIcs(record, now, eventUid(record, occurrence));
  });
  const footer = ["END:VCALENDAR"];
  return [...header, ...vevents, ...footer].map(foldLine).join("\r\n") + "\r\n";
}
