import type { CollectionRecord } from "@/types";

/**
 * What the extractor pulls off a single day cell, before any parsing.
 * Only `extractCells` knows how these map onto the page's markup.
 */
export interface RawCell {
  isPast: boolean;
  /** Date string from the cell's title attribute; null when absent. */
  title: string | null;
  /** Trimmed text of the first nested list item; null when the cell has none. */
  typeText: string | null;
}

export type SkipReason =
  | "past-date"
  | "missing-date"
  | "missing-type"
  | "unparseable-date"
  | "before-today"
  | "empty-type"
  | "unexpected-error";

export type CellResult =
  | { ok: true; record: CollectionRecord }
  | { ok: false; reason: SkipReason; dateText: string | null; detail?: string };
