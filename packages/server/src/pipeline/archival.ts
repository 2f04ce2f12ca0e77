// =============================================================================
// @topicwire/server: Archival sweeper
// =============================================================================
// Deletes processed articles and analytics events older than their
// retention windows. Unprocessed articles are never touched. Deletion runs
// in bounded batches so a large backlog does not hold one huge transaction.
// =============================================================================

import { errorMessage } from "@topicwire/shared";
import type { PipelineDependencies } from "../server.js";

const DAY_MS = 86_400_000;

export interface ArchivalOptions {
  /** Epoch ms the cutoffs are computed from; defaults to Date.now(). */
  now?: number;
  /** Count what would be deleted, delete nothing, record nothing. */
  dryRun?: boolean;
}

export interface ArchivalResult {
  status: "completed" | "failed";
  dryRun: boolean;
  articlesDeleted: number;
  eventsDeleted: number;
  articleCutoff: string;
  analyticsCutoff: string;
  error?: string;
}

export type ArchivalDependencies = Pick<
  PipelineDependencies,
  "store" | "analytics" | "settings" | "logger"
>;

export function retentionCutoff(now: number, days: number): string {
  return new Date(now - days * DAY_MS).toISOString();
}

/** Repeats `deleteBatch` until a batch comes back short. */
async function drain(
  deleteBatch: () => Promise<number>,
  batchSize: number,
  onBatch: (deleted: number) => void,
): Promise<void> {
  for (;;) {
    const deleted = await deleteBatch();
    onBatch(deleted);
    if (deleted < batchSize) return;
  }
}

export async function runArchival(
  deps: ArchivalDependencies,
  options: ArchivalOptions = {},
): Promise<ArchivalResult> {
  const retention = deps.settings.retention;
  const logger = deps.logger.child({ pipeline: "archival" });
  const now = options.now ?? Date.now();
  const dryRun = options.dryRun ?? false;

  const result: ArchivalResult = {
    status: "completed",
    dryRun,
    articlesDeleted: 0,
    eventsDeleted: 0,
    articleCutoff: retentionCutoff(now, retention.articleDays),
    analyticsCutoff: retentionCutoff(now, retention.analyticsDays),
  };

  logger.info("Starting archival", {
    articleCutoff: result.articleCutoff,
    analyticsCutoff: result.analyticsCutoff,
    dryRun,
  });

  try {
    if (dryRun) {
      result.articlesDeleted = await deps.store.countProcessedBefore(
        result.articleCutoff,
      );
      result.eventsDeleted = await deps.analytics.countBefore(
        result.analyticsCutoff,
      );
      logger.info("Archival dry run", { ...result });
      return result;
    }

    await drain(
      () =>
        deps.store.deleteProcessedBefore(
          result.articleCutoff,
          retention.deleteBatchSize,
        ),
      retention.deleteBatchSize,
      (n) => {
        result.articlesDeleted += n;
      },
    );
    logger.info("Archived processed articles", {
      count: result.articlesDeleted,
    });

    await drain(
      () =>
        deps.analytics.deleteBefore(
          result.analyticsCutoff,
          retention.deleteBatchSize,
        ),
      retention.deleteBatchSize,
      (n) => {
        result.eventsDeleted += n;
      },
    );
    logger.info("Archived analytics events", { count: result.eventsDeleted });

    await deps.analytics.record("archival_completed", toDetails(result));
    logger.info("Archival completed", { ...result });
    return result;
  } catch (err) {
    const error = errorMessage(err);
    logger.error("Archival failed", {
      error,
      articlesDeleted: result.articlesDeleted,
      eventsDeleted: result.eventsDeleted,
    });
    const failed: ArchivalResult = { ...result, status: "failed", error };
    if (!dryRun) {
      try {
        await deps.analytics.record("archival_failed", toDetails(failed));
      } catch (recordErr) {
        logger.error("Failed to record archival failure", {
          error: errorMessage(recordErr),
        });
      }
    }
    return failed;
  }
}

function toDetails(result: ArchivalResult): Record<string, unknown> {
  return {
    articles_deleted: result.articlesDeleted,
    analytics_events_deleted: result.eventsDeleted,
    article_cutoff: result.articleCutoff,
    analytics_cutoff: result.analyticsCutoff,
    ...(result.error !== undefined ? { error: result.error } : {}),
  };
}
