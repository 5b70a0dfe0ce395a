import cron, { type ScheduledTask } from "node-cron";
import { getFeedTimeZone, getScrapeCron } from "@/lib/config";

export interface ScrapeSchedule {
  task: ScheduledTask;
  stop(): void;
}

export interface ScheduleOptions {
  cronExpression?: string;
  timeZone?: string;
}

/**
 * Wrap a run so ticks never overlap: a tick that fires while the previous run is
 * still going is skipped. Resolves true when the run happened.
 */
export function createScrapeTick(run: () => Promise<unknown>): () => Promise<boolean> {
  let running = false;
  return async () => {
    if (running) {
      console.warn("[schedule] Previous scrape still running, skipping this tick");
      return false;
    }
    running = true;
    const startedAt = Date.now();
    try {
      await run();
      console.error(`[schedule] Scrape finished in ${Date.now() - startedAt}ms`);
      return true;
    } catch (e) {
      console.error("[schedule] Scrape failed:", e);
      return true;
    } finally {
      running = false;
    }
  };
}

export function startScrapeSchedule(
  run: () => Promise<unknown>,
  opts: ScheduleOptions = {}
): ScrapeSchedule {
  const cronExpression = opts.cronExpression ?? getScrapeCron();
  const timeZone = opts.timeZone ?? getFeedTimeZone();
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  const tick = createScrapeTick(run);
  const task = cron.schedule(
    cronExpression,
    () => {
      void tick();
    },
    { timezone: timeZone }
  );
  console.error(`[schedule] Scraping on "${cronExpression}" (${timeZone})`);

  return {
    task,
    stop() {
      task.stop();
      console.error("[schedule] Stopped");
    },
  };
}
