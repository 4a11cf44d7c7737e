import { RowParseError } from "../shared/errors.js";
import type { RecordCandidate } from "../shared/record.js";
import { extractYear, parseStrictDate, stripQuotes, toAbsoluteMeasure, toFloat, toInt } from "./normalize.js";

export type RawCell = {
  /** Full cell text. */
  text: string;
  /** Cell text without its date sub-element. */
  valueText: string;
  /** Text of the embedded `span.date-style`, when the cell has one. */
  dateText: string | null;
};

export const MIN_CELLS = 6;

const Column = {
  rank: 0,
  title: 1,
  author: 2,
  measure: 3,
  year: 4,
  dailyRate: 5,
  duration: 6
} as const;

const beforeFootnote = (text: string) => text.split("[")[0].trim();

/**
 * Maps one data row onto a record candidate by column position.
 * Returns null for rows that are too short to be data rows; throws
 * RowParseError when the row is long enough but has no usable rank.
 */
export const parseRow = (cells: RawCell[]): RecordCandidate | null => {
  if (cells.length < MIN_CELLS) return null;

  const rank = toInt(beforeFootnote(cells[Column.rank].text));
  if (rank === null) {
    throw new RowParseError(`Invalid rank "${cells[Column.rank].text.trim()}"`);
  }

  const measureCell = cells[Column.measure];
  const durationCell = cells.length > Column.duration ? cells[Column.duration] : undefined;

  return {
    rank,
    title: stripQuotes(cells[Column.title].text),
    author: cells[Column.author].text.trim(),
    measure: toAbsoluteMeasure(beforeFootnote(measureCell.valueText)),
    reference_year: extractYear(cells[Column.year].text),
    daily_rate: toFloat(beforeFootnote(cells[Column.dailyRate].text)),
    milestone_date: parseStrictDate(measureCell.dateText),
    duration_days: durationCell ? toInt(beforeFootnote(durationCell.text)) : null
  };
};
