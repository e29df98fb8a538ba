import type { CalendarDate } from "@/types";
import { errorMessage } from "@/lib/errors";
import type { CellResult, RawCell, SkipReason } from "./types";
import { firstDateOfRange, parseCollectionDate } from "./parseDate";
import { compareDates } from "./timezone";

export interface ParseCellOptions {
  /** Today's date in the calendar's timezone; earlier days are dropped. */
  today: CalendarDate;
}

/** "General Waste Collection" -> "General Waste" */
export function normalizeType(label: string): string {
  return label.replace(" Collection", "").trim();
}

function skip(reason: SkipReason, dateText: string | null, detail?: string): CellResult {
  return { ok: false, reason, dateText, detail };
}

function parseCellUnsafe(cell: RawCell, { today }: ParseCellOptions): CellResult {
  if (cell.isPast) return skip("past-date", cell.title);

  const dateText = cell.title;
  if (!dateText) return skip("missing-date", dateText);
  if (cell.typeText === null) return skip("missing-type", dateText);

  const type = normalizeType(cell.typeText);
  const date = parseCollectionDate(firstDateOfRange(dateText));
  if (!date) return skip("unparseable-date", dateText);

  if (compareDates(date, today) < 0) return skip("before-today", dateText);
  if (!type) return skip("empty-type", dateText);

  return { ok: true, record: { date, type } };
}

/**
 * Turn one day cell into a collection record, or the reason it was skipped.
 * Never throws; anything unexpected comes back as an "unexpected-error" skip.
 */
export function parseCell(cell: RawCell, options: ParseCellOptions): CellResult {
  try {
    return parseCellUnsafe(cell, options);
  } catch (e) {
    return skip("unexpected-error", cell.title, errorMessage(e));
  }
}
