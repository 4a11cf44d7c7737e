export type StreamRecord = {
  scraping_date: string; // YYYY-MM-DD
  rank: number;
  title: string;
  author: string;
  measure: number | null;
  reference_year: number | null;
  daily_rate: number | null;
  milestone_date: string | null; // YYYY-MM-DD
  duration_days: number | null;
};

export type RecordCandidate = Omit<StreamRecord, "scraping_date">;

export const naturalKey = (record: StreamRecord) =>
  [record.scraping_date, record.rank, record.title, record.author].join("\u0000");
