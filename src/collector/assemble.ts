import { describeError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { StreamRecord } from "../shared/record.js";
import { parseRow } from "./row.js";
import { findTargetTable } from "./table.js";

export type AssembleOptions = {
  heading: string;
  scrapingDate: string;
  logger: Logger;
};

export type AssembleResult = {
  records: StreamRecord[];
  /** Data rows that produced no record, short rows included. */
  skipped: number;
  /** Rows that were long enough but failed to parse. */
  failed: number;
};

export const assembleRecords = (html: string, options: AssembleOptions): AssembleResult => {
  const { heading, scrapingDate, logger } = options;
  const table = findTargetTable(html, heading);
  const dataRows = table.rows.slice(1);

  const records: StreamRecord[] = [];
  let skipped = 0;
  let failed = 0;

  for (const cells of dataRows) {
    try {
      const candidate = parseRow(cells);
      if (!candidate) {
        skipped += 1;
        continue;
      }
      records.push({ scraping_date: scrapingDate, ...candidate });
    } catch (error) {
      skipped += 1;
      failed += 1;
      const content = cells.map((cell) => cell.text.trim()).join(" | ");
      logger.warn(`Skipping row: ${describeError(error)} (content: ${content})`);
    }
  }

  logger.info(
    `Parsed "${table.heading}": ${records.length} records, ${skipped} skipped (${failed} failed) of ${dataRows.length} rows`
  );
  return { records, skipped, failed };
};
