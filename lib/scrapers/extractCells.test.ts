import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_CONFIG } from "@/lib/config";
import { extractCells } from "./extractCells";

const __dirname = dirname(fileURLToPath(import.meta.url));

function loadFixture(name: string): string {
  return readFileSync(join(__dirname, "fixtures", "shropshire", name), "utf-8");
}

describe("extractCells", () => {
  it("returns one raw cell per day cell in document order", () => {
    const cells = extractCells(loadFixture("calendar.html"), DEFAULT_CONFIG.selectors);

    expect(cells).toEqual([
      { isPast: true, title: "Monday 05, May 2025", typeText: "General Waste Collection" },
      { isPast: false, title: "Thursday 08, May 2025", typeText: "General Waste Collection" },
      { isPast: false, title: "Friday 09, May 2025", typeText: null },
      { isPast: false, title: null, typeText: "Recycling Collection" },
      {
        isPast: false,
        title: "Monday 12, May 2025 - Tuesday 13, May 2025",
        typeText: "Recycling Collection",
      },
      { isPast: false, title: "12/05/2025", typeText: "Garden Waste Collection" },
      { isPast: false, title: "Thursday 22, May 2025", typeText: "Garden Waste Collection" },
      { isPast: false, title: "Thursday 29, May 2025", typeText: "" },
    ]);
  });

  it("finds nothing when the day-cell class is missing", () => {
    expect(extractCells(loadFixture("no-cells.html"), DEFAULT_CONFIG.selectors)).toEqual([]);
  });

  it("follows the configured selectors", () => {
    const html = `<section><p class="slot" title="Thursday 08, May 2025"><em>Food</em></p></section>`;
    const cells = extractCells(html, { dayCell: "p.slot", pastDateClass: "gone", typeItem: "em" });
    expect(cells).toEqual([{ isPast: false, title: "Thursday 08, May 2025", typeText: "Food" }]);
  });

  it("decodes entities in the type label", () => {
    const html = `<div class="calendar-table-cell" title="Thursday 08, May 2025"><ul><li>Food &amp; Glass Collection</li></ul></div>`;
    expect(extractCells(html, DEFAULT_CONFIG.selectors)[0]?.typeText).toBe("Food & Glass Collection");
  });
});
