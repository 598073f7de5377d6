// =============================================================================
// @trendwire/server — Cron scheduler for ingestion
// =============================================================================
// Wraps node-cron to run ingestion on a configurable schedule.
// Controlled via env vars: CRON_ENABLED (kill switch) and CRON_INGEST.
// Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron from "node-cron";
import { errorMessage } from "@trendwire/shared";
import { IngestionInProgressError } from "@trendwire/worker";
import type { AppDependencies } from "./server.js";
import { runIngestionJob } from "./tools/ingestion.js";

export interface SchedulerHandle {
  stop(): void;
}

export function startScheduler(deps: AppDependencies): SchedulerHandle {
  const { config, logger } = deps;
  const tasks: cron.ScheduledTask[] = [];

  if (!config.CRON_ENABLED) {
    logger.info("Cron scheduler disabled (CRON_ENABLED=false)");
    return { stop() {} };
  }

  if (!cron.validate(config.CRON_INGEST)) {
    logger.error("Invalid cron expression, scheduler not started", {
      CRON_INGEST: config.CRON_INGEST,
    });
    return { stop() {} };
  }

  function scheduleJob(
    name: string,
    schedule: string,
    job: () => Promise<unknown>,
  ): void {
    const task = cron.schedule(schedule, async () => {
      const start = performance.now();
      logger.info(`Cron job starting: ${name}`);
      try {
        const result = await job();
        const durationMs = Math.round(performance.now() - start);
        logger.info(`Cron job completed: ${name}`, { durationMs, result });
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);
        if (err instanceof IngestionInProgressError) {
          logger.warn(`Cron job skipped: ${name}`, {
            durationMs,
            reason: err.message,
          });
          return;
        }
        logger.error(`Cron job failed: ${name}`, {
          durationMs,
          error: errorMessage(err),
        });
      }
    });
    tasks.push(task);
  }

  scheduleJob("run_ingestion", config.CRON_INGEST, () =>
    runIngestionJob(deps),
  );

  logger.info("Cron scheduler started", {
    schedules: { run_ingestion: config.CRON_INGEST },
  });

  return {
    stop() {
      for (const t of tasks) t.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
