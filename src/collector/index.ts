import { config, envInfo } from "../shared/config.js";
import { closePool, getPool, readSchema } from "../shared/db.js";
import { consoleLogger, createFileLogger, teeLogger } from "../shared/logger.js";
import { MemoryRecordStore, PgRecordStore, type RecordStore } from "../shared/store.js";
import { createFetcher } from "./fetch.js";
import { createRunner } from "./run.js";
import { createJobController, registerSchedule } from "./schedule.js";

type RunOptions = {
  once: boolean;
  dryRun: boolean;
};

const parseArgs = (argv: string[]): RunOptions => ({
  once: argv.includes("--once"),
  dryRun: argv.includes("--dry-run")
});

const logger = teeLogger(
  consoleLogger,
  createFileLogger({
    filePath: config.logFile,
    maxBytes: config.logMaxBytes,
    backupCount: config.logBackupCount
  })
);

const createStore = (dryRun: boolean): RecordStore => {
  if (dryRun) {
    return new MemoryRecordStore();
  }
  if (!config.dbUrl) {
    const details = envInfo.envFileExists ? `Check ${envInfo.envFile}.` : `Expected ${envInfo.envFile} (not found).`;
    throw new Error(`DATABASE_URL is required (or pass --dry-run). ${details}`);
  }
  return new PgRecordStore(getPool(config.dbUrl), readSchema);
};

const main = async () => {
  const options = parseArgs(process.argv.slice(2));
  const store = createStore(options.dryRun);
  const runner = createRunner({
    targetUrl: config.targetUrl,
    targetHeading: config.targetHeading,
    fetchDocument: createFetcher({ userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs }),
    store,
    logger
  });

  if (options.once) {
    try {
      process.exitCode = await runner.runToExitCode();
    } finally {
      await closePool();
    }
    return;
  }

  const controller = createJobController(runner.runOnce, logger);
  const task = registerSchedule(
    controller,
    { expression: config.scrapeSchedule, timezone: config.scrapeTimezone },
    logger
  );
  logger.info(`Collector scheduled (${config.scrapeSchedule}). Press Ctrl+C to stop.`);

  const stop = () => {
    task.stop();
    logger.info("Collector stopped");
    closePool().catch((error) => logger.error("Closing database pool failed", error));
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const first = controller.trigger("startup");
  if (first.started) {
    await first.done;
  }
};

main().catch((err) => {
  logger.error("Collector failed", err);
  process.exitCode = 1;
});
