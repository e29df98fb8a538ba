export type ScrapeErrorCode = "fetch-failed" | "no-day-cells" | "write-failed";

/** Conditions that end the run with a non-zero exit status. */
export class ScrapeError extends Error {
  constructor(
    public readonly code: ScrapeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ScrapeError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
