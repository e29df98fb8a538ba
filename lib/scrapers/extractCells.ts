import * as cheerio from "cheerio";
import type { CellSelectors } from "@/lib/config";
import type { RawCell } from "./types";

/**
 * Pull every day cell off the calendar page, in document order.
 *
 * This is the only place tied to the council page's markup; when the site
 * changes, the selectors in config and this function are what move.
 */
export function extractCells(html: string, selectors: CellSelectors): RawCell[] {
  const $ = cheerio.load(html);
  const cells: RawCell[] = [];

  $(selectors.dayCell).each((_, el) => {
    const $cell = $(el);
    const title = $cell.attr("title") ?? null;
    const $item = $cell.find(selectors.typeItem).first();
    cells.push({
      isPast: $cell.hasClass(selectors.pastDateClass),
      title,
      typeText: $item.length ? $item.text().trim() : null,
    });
  });

  return cells;
}
