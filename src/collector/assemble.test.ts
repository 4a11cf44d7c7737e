import fs from "fs";
import { describe, expect, it, vi } from "vitest";
import { TableNotFoundError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { assembleRecords } from "./assemble.js";

const html = fs.readFileSync(new URL("./__fixtures__/leaderboard.html", import.meta.url), "utf-8");

const createLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() }) satisfies Logger;

describe("assembleRecords", () => {
  it("keeps well-formed rows and counts short ones as skipped", () => {
    const logger = createLogger();

    const result = assembleRecords(html, { heading: "Most-streamed songs", scrapingDate: "2026-10-19", logger });

    expect(result.skipped).toBe(1);
    expect(result.failed).toBe(0);
    expect(result.records.map((record) => record.measure)).toEqual([2.5e9, 8e8]);
    expect(result.records[0]).toEqual({
      scraping_date: "2026-10-19",
      rank: 1,
      title: "Song A",
      author: "Artist A",
      measure: 2.5e9,
      reference_year: 2020,
      daily_rate: null,
      milestone_date: "2019-11-29",
      duration_days: 1450
    });
    expect(result.records[1]).toEqual({
      scraping_date: "2026-10-19",
      rank: 3,
      title: "Song C",
      author: "Artist C",
      measure: 8e8,
      reference_year: 2019,
      daily_rate: 1234,
      milestone_date: null,
      duration_days: null
    });
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(
      'Parsed "Most-streamed songs[edit]": 2 records, 1 skipped (0 failed) of 3 rows'
    );
  });

  it("logs and skips rows that fail to parse", () => {
    const logger = createLogger();
    const page = `
      <h2>Most-streamed songs</h2>
      <table class="wikitable">
        <tr><th>Rank</th><th>Song</th><th>Artist</th><th>Streams</th><th>Year</th><th>Daily</th></tr>
        <tr><td>—</td><td>Song X</td><td>Artist X</td><td>1 billion</td><td>2020</td><td>10</td></tr>
        <tr><td>2</td><td>Song Y</td><td>Artist Y</td><td>2 billion</td><td>2021</td><td>20</td></tr>
      </table>`;

    const result = assembleRecords(page, { heading: "Most-streamed songs", scrapingDate: "2026-10-19", logger });

    expect(result.records.map((record) => record.title)).toEqual(["Song Y"]);
    expect(result.skipped).toBe(1);
    expect(result.failed).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping row: Invalid rank "—" (content: — | Song X | Artist X | 1 billion | 2020 | 10)'
    );
  });

  it("reads the release year from a date element", () => {
    const page = `
      <h2>Most-streamed songs</h2>
      <table class="wikitable">
        <tr><th>Rank</th><th>Song</th><th>Artist</th><th>Streams</th><th>Release</th><th>Daily</th></tr>
        <tr><td>1</td><td>Song Z</td><td>Artist Z</td><td>1 billion</td><td><span class="date-style">29 November 2019</span></td><td>10</td></tr>
      </table>`;

    const result = assembleRecords(page, {
      heading: "Most-streamed songs",
      scrapingDate: "2026-10-19",
      logger: createLogger()
    });

    expect(result.records.map((record) => [record.reference_year, record.milestone_date])).toEqual([[2019, null]]);
  });

  it("returns an empty batch when the table only has a header", () => {
    const page = `<h2>Most-streamed songs</h2><table class="wikitable"><tr><th>Rank</th></tr></table>`;

    const result = assembleRecords(page, {
      heading: "Most-streamed songs",
      scrapingDate: "2026-10-19",
      logger: createLogger()
    });

    expect(result).toEqual({ records: [], skipped: 0, failed: 0 });
  });

  it("propagates a missing table", () => {
    expect(() =>
      assembleRecords("<p>moved</p>", { heading: "Most-streamed songs", scrapingDate: "2026-10-19", logger: createLogger() })
    ).toThrow(TableNotFoundError);
  });
});
