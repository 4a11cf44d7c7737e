import * as cheerio from "cheerio";
import { TableNotFoundError } from "../shared/errors.js";
import type { RawCell } from "./row.js";

export type LocatedTable = {
  heading: string;
  /** Every `tr` of the table, header row included. */
  rows: RawCell[][];
};

const TABLE_SELECTOR = "table.wikitable";
const DATE_SELECTOR = "span.date-style";

/**
 * Returns the first `table.wikitable` whose nearest preceding h2 contains
 * `heading`. Headings and tables are visited in document order, so the last
 * h2 seen before a table is the one that titles it.
 */
export const findTargetTable = (html: string, heading: string): LocatedTable => {
  const $ = cheerio.load(html);
  let currentHeading: string | null = null;
  const located: LocatedTable[] = [];

  $(`h2, ${TABLE_SELECTOR}`).each((_, element) => {
    const $element = $(element);
    if ($element.is("h2")) {
      currentHeading = $element.text().trim();
      return;
    }
    if (currentHeading === null || !currentHeading.includes(heading)) return;

    const rows: RawCell[][] = [];
    $element.find("tr").each((_, row) => {
      const cells: RawCell[] = [];
      $(row)
        .children("th, td")
        .each((_, cell) => {
          const $cell = $(cell);
          const $date = $cell.find(DATE_SELECTOR).first();
          const $text = $cell.clone();
          $text.find(DATE_SELECTOR).remove();
          cells.push({
            text: $cell.text(),
            valueText: $text.text(),
            dateText: $date.length > 0 ? $date.text().trim() : null
          });
        });
      rows.push(cells);
    });
    located.push({ heading: currentHeading, rows });
    return false;
  });

  if (located.length === 0) {
    throw new TableNotFoundError(heading);
  }
  return located[0];
};
