// =============================================================================
// @topicwire/server: Cron scheduler for pipeline jobs
// =============================================================================
// Wraps node-cron to run discovery and archival on configurable schedules.
// Controlled via env vars: CRON_ENABLED (kill switch), plus per-job schedules.
// Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron from "node-cron";
import { errorMessage } from "@topicwire/shared";
import type { AppDependencies } from "./server.js";
import { runDiscovery } from "./pipeline/discovery.js";
import { runArchival } from "./pipeline/archival.js";

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

  // Helper to wrap each job with logging and error handling
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
        logger.error(`Cron job failed: ${name}`, {
          durationMs,
          error: errorMessage(err),
        });
      }
    });
    tasks.push(task);
  }

  scheduleJob("run_discovery", config.CRON_DISCOVERY, () => runDiscovery(deps));

  scheduleJob("run_archival", config.CRON_ARCHIVAL, () => runArchival(deps));

  logger.info("Cron scheduler started", {
    schedules: {
      run_discovery: config.CRON_DISCOVERY,
      run_archival: config.CRON_ARCHIVAL,
    },
  });

  return {
    stop() {
      for (const t of tasks) t.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
