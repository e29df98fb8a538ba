import { ScrapeError, errorMessage } from "@/lib/errors";

export interface FetchHtmlOptions {
  userAgent: string;
  timeoutMs: number;
}

export type FetchHtml = (url: string, options: FetchHtmlOptions) => Promise<string>;

/**
 * Fetch HTML from a URL with a browser-like user-agent.
 * Any network error, timeout or non-2xx status becomes a `fetch-failed` ScrapeError.
 */
export const fetchHtml: FetchHtml = async (url, { userAgent, timeoutMs }) => {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": userAgent, Accept: "text/html,application/xhtml+xml" },
    });
    if (!res.ok) {
      throw new ScrapeError("fetch-failed", `HTTP ${res.status}: ${url}`);
    }
    return await res.text();
  } catch (e) {
    if (e instanceof ScrapeError) throw e;
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(e);
    throw new ScrapeError("fetch-failed", `Error fetching ${url}: ${reason}`, { cause: e });
  } finally {
    clearTimeout(timeoutId);
  }
};
