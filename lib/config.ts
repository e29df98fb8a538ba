import { DEFAULT_TIMEZONE } from "@/types";

export interface CellSelectors {
  /** Matches every calendar day cell on the page. */
  dayCell: string;
  /** Class carried by cells for days already gone. */
  pastDateClass: string;
  /** First match inside a cell holds the collection type. */
  typeItem: string;
}

export interface ScraperConfig {
  url: string;
  outputPath: string;
  userAgent: string;
  timeoutMs: number;
  timeZone: string;
  calendarName: string;
  productId: string;
  selectors: CellSelectors;
}

const UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * Fixed run parameters. There are no flags or env overrides; tests build their
 * own config with `{ ...DEFAULT_CONFIG, ... }`.
 */
export const DEFAULT_CONFIG: ScraperConfig = {
  url: "https://bins.shropshire.gov.uk/property/100070039508",
  outputPath: "shropshire_bin_collections.ics",
  userAgent: UA,
  timeoutMs: 20_000,
  timeZone: DEFAULT_TIMEZONE,
  calendarName: "Bin Collections",
  productId: "-//Bin Collection Calendar//EN",
  selectors: {
    dayCell: "div.calendar-table-cell",
    pastDateClass: "past-date",
    typeItem: "li",
  },
};
