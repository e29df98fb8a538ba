import { writeFile } from "node:fs/promises";
import type { CollectionRecord, Logger } from "@/types";
import type { ScraperConfig } from "@/lib/config";
import { ScrapeError, errorMessage } from "@/lib/errors";
import { fetchHtml, type FetchHtml } from "@/lib/scrapers/fetchHtml";
import { extractCells } from "@/lib/scrapers/extractCells";
import { parseCell } from "@/lib/scrapers/parseCell";
import { dateInTimeZone, toIsoDate } from "@/lib/scrapers/timezone";
import type { SkipReason } from "@/lib/scrapers/types";
import { formatIcsCalendar } from "@/lib/calendar/formatIcs";

export interface ScrapeDeps {
  fetchHtml: FetchHtml;
  writeFile: (path: string, data: string) => Promise<void>;
  now: () => Date;
  logger: Logger;
}

export interface ScrapeSummary {
  cellCount: number;
  records: CollectionRecord[];
  skipped: Partial<Record<SkipReason, number>>;
  /** False only when the empty calendar could not be written. */
  wroteFile: boolean;
}

const defaultDeps: ScrapeDeps = {
  fetchHtml,
  writeFile: (path, data) => writeFile(path, data, "utf8"),
  now: () => new Date(),
  logger: console,
};

function formatSkipCounts(skipped: ScrapeSummary["skipped"]): string {
  return Object.entries(skipped)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(", ");
}

/**
 * Fetch the collection calendar page and write the upcoming collections to an ICS file.
 * Throws ScrapeError for conditions that should fail the run.
 */
export async function runScrape(
  config: ScraperConfig,
  overrides: Partial<ScrapeDeps> = {}
): Promise<ScrapeSummary> {
  const deps: ScrapeDeps = { ...defaultDeps, ...overrides };
  const { logger } = deps;

  logger.log(`Attempting to fetch data from: ${config.url}`);
  const html = await deps.fetchHtml(config.url, {
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
  });
  logger.log("Successfully fetched page content.");

  logger.log("Parsing page content to find collection dates...");
  const cells = extractCells(html, config.selectors);
  logger.log(`Found ${cells.length} potential calendar day cells.`);
  if (cells.length === 0) {
    throw new ScrapeError(
      "no-day-cells",
      `Could not find any elements matching '${config.selectors.dayCell}'. The website structure might have changed.`
    );
  }

  const now = deps.now();
  const today = dateInTimeZone(now, config.timeZone);
  const records: CollectionRecord[] = [];
  const skipped: ScrapeSummary["skipped"] = {};

  for (const cell of cells) {
    const result = parseCell(cell, { today });
    if (!result.ok) {
      skipped[result.reason] = (skipped[result.reason] ?? 0) + 1;
      if (result.reason === "unexpected-error") {
        logger.warn(
          `[parse] Unexpected error processing cell (${result.dateText ?? "No Title"}): ${result.detail ?? "unknown"}. Skipping cell.`
        );
      }
      continue;
    }
    records.push(result.record);
    logger.log(`  SUCCESS: Added event '${result.record.type}' on ${toIsoDate(result.record.date)}`);
  }

  if (Object.keys(skipped).length > 0) {
    logger.log(`Skipped cells: ${formatSkipCounts(skipped)}`);
  }

  const ics = formatIcsCalendar(records, {
    productId: config.productId,
    calendarName: config.calendarName,
    timeZone: config.timeZone,
    now,
  });

  if (records.length > 0) {
    logger.log(`\nFound and processed ${records.length} future collection dates.`);
    try {
      await deps.writeFile(config.outputPath, ics);
    } catch (e) {
      throw new ScrapeError(
        "write-failed",
        `Error writing iCal file '${config.outputPath}': ${errorMessage(e)}`,
        { cause: e }
      );
    }
    logger.log(`Successfully created iCalendar file: ${config.outputPath}`);
    return { cellCount: cells.length, records, skipped, wroteFile: true };
  }

  logger.log("\nNo valid future collection dates were parsed from the calendar cells found.");
  logger.log("This can be normal if no future dates are listed yet, or the website structure changed slightly.");
  try {
    await deps.writeFile(config.outputPath, ics);
  } catch (e) {
    logger.error(`[write] Error writing empty iCal file '${config.outputPath}': ${errorMessage(e)}`);
    return { cellCount: cells.length, records, skipped, wroteFile: false };
  }
  logger.log(`Created empty calendar file: ${config.outputPath}`);
  return { cellCount: cells.length, records, skipped, wroteFile: true };
}
