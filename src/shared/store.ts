import { z } from "zod";
import { PersistenceError, describeError } from "./errors.js";
import { naturalKey, type StreamRecord } from "./record.js";

export interface RecordStore {
  ensureSchema(): Promise<void>;
  /** Atomically replaces every record of `date` with `records`. */
  replaceBatch(date: string, records: StreamRecord[]): Promise<void>;
  queryByTitle(pattern: string): Promise<StreamRecord[]>;
  queryLatestTop(limit: number): Promise<StreamRecord[]>;
}

export type SqlResult = { rows: unknown[] };

export type SqlClient = {
  query: (text: string, values?: unknown[]) => Promise<SqlResult>;
  /** Passing an error destroys the connection instead of returning it to the pool. */
  release: (err?: Error) => void;
};

export type SqlPool = {
  query: (text: string, values?: unknown[]) => Promise<SqlResult>;
  connect: () => Promise<SqlClient>;
};

const recordRowSchema = z.object({
  scraping_date: z.string(),
  rank: z.number().int(),
  title: z.string(),
  author: z.string(),
  measure: z.number().nullable(),
  reference_year: z.number().int().nullable(),
  daily_rate: z.number().nullable(),
  milestone_date: z.string().nullable(),
  duration_days: z.number().int().nullable()
});

const recordRowsSchema = z.array(recordRowSchema);

const SELECT_COLUMNS = `
  to_char(scraping_date, 'YYYY-MM-DD') AS scraping_date,
  rank, title, author, measure, reference_year, daily_rate, milestone_date, duration_days
`;

const INSERT_RECORD = `
  INSERT INTO stream_records (
    scraping_date, rank, title, author, measure,
    reference_year, daily_rate, milestone_date, duration_days
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
`;

const escapeLike = (pattern: string) => pattern.replace(/[\\%_]/g, "\\$&");

const assertBatchDate = (date: string, records: StreamRecord[]) => {
  const stray = records.find((record) => record.scraping_date !== date);
  if (stray) {
    throw new PersistenceError(
      `Record "${stray.title}" is dated ${stray.scraping_date}, batch is for ${date}`
    );
  }
};

export class PgRecordStore implements RecordStore {
  constructor(
    private readonly pool: SqlPool,
    private readonly readSchema: () => string
  ) {}

  async ensureSchema() {
    await this.pool.query(this.readSchema());
  }

  async replaceBatch(date: string, records: StreamRecord[]) {
    assertBatchDate(date, records);
    const client = await this.pool.connect();
    let releaseError: Error | undefined;
    try {
      await client.query("BEGIN");
      await client.query("DELETE FROM stream_records WHERE scraping_date = $1", [date]);
      for (const record of records) {
        await client.query(INSERT_RECORD, [
          record.scraping_date,
          record.rank,
          record.title,
          record.author,
          record.measure,
          record.reference_year,
          record.daily_rate,
          record.milestone_date,
          record.duration_days
        ]);
      }
      await client.query("COMMIT");
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw new PersistenceError(`Replacing batch for ${date} failed: ${describeError(error)}`, { cause: error });
    } finally {
      client.release(releaseError);
    }
  }

  async queryByTitle(pattern: string) {
    const result = await this.pool.query(
      `SELECT ${SELECT_COLUMNS}
       FROM stream_records
       WHERE title ILIKE $1
       ORDER BY scraping_date, rank`,
      [`%${escapeLike(pattern)}%`]
    );
    return recordRowsSchema.parse(result.rows);
  }

  async queryLatestTop(limit: number) {
    const result = await this.pool.query(
      `SELECT ${SELECT_COLUMNS}
       FROM stream_records
       WHERE scraping_date = (SELECT MAX(scraping_date) FROM stream_records)
       ORDER BY rank
       LIMIT $1`,
      [limit]
    );
    return recordRowsSchema.parse(result.rows);
  }
}

/** Keeps records in process; used for dry runs. */
export class MemoryRecordStore implements RecordStore {
  private records: StreamRecord[] = [];

  async ensureSchema() {}

  async replaceBatch(date: string, records: StreamRecord[]) {
    assertBatchDate(date, records);
    const seen = new Set<string>();
    for (const record of records) {
      const key = naturalKey(record);
      if (seen.has(key)) {
        throw new PersistenceError(
          `Duplicate record for ${date}: rank ${record.rank} "${record.title}" by ${record.author}`
        );
      }
      seen.add(key);
    }
    this.records = [
      ...this.records.filter((record) => record.scraping_date !== date),
      ...records.map((record) => ({ ...record }))
    ];
  }

  async queryByTitle(pattern: string) {
    const needle = pattern.toLowerCase();
    return this.records
      .filter((record) => record.title.toLowerCase().includes(needle))
      .sort((a, b) => a.scraping_date.localeCompare(b.scraping_date) || a.rank - b.rank)
      .map((record) => ({ ...record }));
  }

  async queryLatestTop(limit: number) {
    const latest = this.records.reduce<string | null>(
      (max, record) => (max === null || record.scraping_date > max ? record.scraping_date : max),
      null
    );
    return this.records
      .filter((record) => record.scraping_date === latest)
      .sort((a, b) => a.rank - b.rank)
      .slice(0, limit)
      .map((record) => ({ ...record }));
  }

  all() {
    return this.records.map((record) => ({ ...record }));
  }
}
