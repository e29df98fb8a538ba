import type { Logger } from "@/types";
import { DEFAULT_CONFIG, type ScraperConfig } from "@/lib/config";
import { ScrapeError } from "@/lib/errors";
import { runScrape, type ScrapeDeps } from "@/lib/pipeline/runScrape";

const TAGS: Record<ScrapeError["code"], string> = {
  "fetch-failed": "[fetch]",
  "no-day-cells": "[parse]",
  "write-failed": "[write]",
};

/** Run once and map the outcome to a process exit code. */
export async function main(
  config: ScraperConfig = DEFAULT_CONFIG,
  overrides: Partial<ScrapeDeps> = {}
): Promise<number> {
  const logger: Logger = overrides.logger ?? console;
  logger.log("--- Starting Bin Collection Calendar ICS Generation ---");
  try {
    await runScrape(config, { ...overrides, logger });
  } catch (e) {
    if (e instanceof ScrapeError) {
      logger.error(`${TAGS[e.code]} ${e.message}`);
    } else {
      logger.error("[scrape] failed:", e);
    }
    return 1;
  }
  logger.log("\n--- Script finished. ---");
  return 0;
}
