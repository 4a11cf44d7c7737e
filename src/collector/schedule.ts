import cron from "node-cron";
import type { Logger } from "../shared/logger.js";

type TriggerSource = "startup" | "cron" | "manual";

export type TriggerResult =
  | { started: true; done: Promise<void> }
  | {
      started: false;
      reason: "already_running";
      runningSince: string | null;
    };

/**
 * Wraps a run so that overlapping triggers are skipped and a failed run is
 * logged instead of escaping into the scheduling loop.
 */
export const createJobController = (runOnce: () => Promise<void>, logger: Logger) => {
  let isRunning = false;
  let startedAtIso: string | null = null;

  const runJob = async (source: TriggerSource, startedAtMs: number): Promise<void> => {
    try {
      await runOnce();
      logger.info(`Collection finished (source=${source}, durationMs=${Date.now() - startedAtMs})`);
    } catch (error) {
      logger.error(`Collection failed (source=${source}, durationMs=${Date.now() - startedAtMs})`, error);
    } finally {
      isRunning = false;
      startedAtIso = null;
    }
  };

  const trigger = (source: TriggerSource): TriggerResult => {
    if (isRunning) {
      return { started: false, reason: "already_running", runningSince: startedAtIso };
    }
    isRunning = true;
    const startedAtMs = Date.now();
    startedAtIso = new Date(startedAtMs).toISOString();
    logger.info(`Collection started (source=${source})`);
    return { started: true, done: runJob(source, startedAtMs) };
  };

  return {
    trigger,
    getRuntimeState: () => ({ isRunning, startedAtIso })
  };
};

export type JobController = ReturnType<typeof createJobController>;

export type ScheduleOptions = {
  expression: string;
  timezone?: string;
};

export const registerSchedule = (controller: JobController, options: ScheduleOptions, logger: Logger) => {
  if (!cron.validate(options.expression)) {
    throw new Error(`Invalid SCRAPE_SCHEDULE expression: ${options.expression}`);
  }
  return cron.schedule(
    options.expression,
    () => {
      const result = controller.trigger("cron");
      if (!result.started) {
        logger.warn(`Scheduled collection skipped: already running since ${result.runningSince ?? "unknown"}`);
      }
    },
    options.timezone ? { timezone: options.timezone } : undefined
  );
};
