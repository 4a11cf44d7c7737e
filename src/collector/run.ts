import type { Logger } from "../shared/logger.js";
import type { RecordStore } from "../shared/store.js";
import { assembleRecords } from "./assemble.js";
import type { DocumentFetcher } from "./fetch.js";
import { toCollectionDate } from "./normalize.js";

export type RunnerDeps = {
  targetUrl: string;
  targetHeading: string;
  fetchDocument: DocumentFetcher;
  store: RecordStore;
  logger: Logger;
  now?: () => Date;
};

export type RunSummary = {
  scrapingDate: string;
  saved: number;
  skipped: number;
  failed: number;
};

export const createRunner = (deps: RunnerDeps) => {
  const { targetUrl, targetHeading, fetchDocument, store, logger } = deps;
  const now = deps.now ?? (() => new Date());

  const collect = async (): Promise<RunSummary> => {
    const scrapingDate = toCollectionDate(now());
    logger.info(`Collecting "${targetHeading}" from ${targetUrl} for ${scrapingDate}`);

    await store.ensureSchema();
    const html = await fetchDocument(targetUrl);
    const { records, skipped, failed } = assembleRecords(html, {
      heading: targetHeading,
      scrapingDate,
      logger
    });

    if (records.length === 0) {
      logger.warn(`No records found for ${scrapingDate}; nothing saved`);
      return { scrapingDate, saved: 0, skipped, failed };
    }

    await store.replaceBatch(scrapingDate, records);
    logger.info(`Saved ${records.length} records for ${scrapingDate}`);
    return { scrapingDate, saved: records.length, skipped, failed };
  };

  /** One full fetch, parse and persist pass. Rejects when the run fails. */
  const runOnce = async (): Promise<void> => {
    const startedAtMs = now().getTime();
    try {
      const summary = await collect();
      logger.info(`Run completed in ${now().getTime() - startedAtMs}ms (saved=${summary.saved}, skipped=${summary.skipped})`);
    } catch (error) {
      logger.error("Run failed", error);
      throw error;
    }
  };

  /** For one-shot invocations: the failure is already logged, only the exit code is left. */
  const runToExitCode = async (): Promise<number> => {
    try {
      await runOnce();
      return 0;
    } catch {
      return 1;
    }
  };

  return { collect, runOnce, runToExitCode };
};
