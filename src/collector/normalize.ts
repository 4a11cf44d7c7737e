// Soft-fail conversions for the leaderboard cells. Each returns null instead of
// throwing: the source table carries footnote markers and hand-written numbers.

const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INT_LITERAL = /^[+-]?\d+$/;
const YEAR_TOKEN = /\b(19|20)\d{2}\b/;
const TRAILING_FOOTNOTES = /(\s*\[[^\]]*\])+\s*$/;
const FOOTNOTE_SPAN = /\[.*\]/g;
const STRICT_DATE = /^(\d{1,2})\s+([A-Za-z]+)\s+(\d{4})$/;

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december"
];

const UNITS: Array<{ word: string; factor: number }> = [
  { word: "billion", factor: 1e9 },
  { word: "million", factor: 1e6 }
];

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

export const toFloat = (text: string | null | undefined): number | null => {
  if (!text) return null;
  const cleaned = text.trim().replaceAll(",", "");
  if (!FLOAT_LITERAL.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
};

export const toInt = (text: string | null | undefined): number | null => {
  const value = toFloat(text);
  return value === null ? null : Math.trunc(value);
};

export const stripTrailingFootnotes = (text: string) => text.replace(TRAILING_FOOTNOTES, "");

export const toAbsoluteMeasure = (text: string | null | undefined): number | null => {
  if (!text) return null;
  const lowered = stripTrailingFootnotes(text).trim().toLowerCase();
  const unit = UNITS.find(({ word }) => lowered.includes(word));
  if (!unit) return toFloat(lowered);
  const value = toFloat(lowered.replace(unit.word, ""));
  return value === null ? null : value * unit.factor;
};

export const extractYear = (text: string | null | undefined): number | null => {
  if (!text) return null;
  const cleaned = text.replace(FOOTNOTE_SPAN, "").trim();

  const match = cleaned.match(YEAR_TOKEN);
  if (match) return Number(match[0]);

  if (/^\d+$/.test(cleaned)) return Number(cleaned);

  // Long-form dates such as "29 November 2019" end with the year.
  const parts = cleaned.split(/\s+/);
  if (parts.length >= 3) {
    const last = parts[parts.length - 1];
    return INT_LITERAL.test(last) ? Number(last) : null;
  }
  return null;
};

const daysInMonth = (year: number, monthIndex: number) => new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate();

/** Accepts only "<day> <month name> <year>", e.g. "29 November 2019". */
export const parseStrictDate = (text: string | null | undefined): string | null => {
  if (!text) return null;
  const match = text.trim().match(STRICT_DATE);
  if (!match) return null;

  const day = Number(match[1]);
  const monthIndex = MONTHS.indexOf(match[2].toLowerCase());
  const year = Number(match[3]);
  if (monthIndex === -1 || day < 1 || day > daysInMonth(year, monthIndex)) return null;

  return `${pad(year, 4)}-${pad(monthIndex + 1)}-${pad(day)}`;
};

export const stripQuotes = (text: string) => text.trim().replace(/["“”]/g, "").trim();

export const toCollectionDate = (date: Date) =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
