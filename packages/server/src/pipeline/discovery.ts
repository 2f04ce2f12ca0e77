// =============================================================================
// @topicwire/server: Discovery pipeline
// =============================================================================
// One sequential pass: subscriber topics -> one search per topic (in
// parallel) -> union of URLs -> drop links already stored -> enqueue.
// A failing topic or a failing enqueue is logged and skipped; the rest of
// the run continues. Nothing thrown here reaches the scheduler.
// =============================================================================

import {
  errorMessage,
  filterNew,
  logExternalCall,
} from "@topicwire/shared";
import type { PipelineDependencies } from "../server.js";
import { aggregateTopics } from "./topics.js";
import { buildSearchQuery } from "./search.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export type DiscoveryStatus = "completed" | "no_topics" | "no_results" | "failed";

export interface DiscoveryResult {
  status: DiscoveryStatus;
  topics: number;
  urlsFound: number;
  alreadyStored: number;
  queued: number;
  enqueueFailures: number;
  failedTopics: string[];
  error?: string;
}

export type DiscoveryDependencies = Pick<
  PipelineDependencies,
  "subscribers" | "search" | "store" | "queue" | "analytics" | "settings" | "logger"
>;

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function runDiscovery(
  deps: DiscoveryDependencies,
): Promise<DiscoveryResult> {
  const { settings } = deps;
  const logger = deps.logger.child({ pipeline: "discovery" });
  const result: DiscoveryResult = {
    status: "completed",
    topics: 0,
    urlsFound: 0,
    alreadyStored: 0,
    queued: 0,
    enqueueFailures: 0,
    failedTopics: [],
  };

  try {
    const topics = await aggregateTopics(deps.subscribers);
    result.topics = topics.size;
    if (topics.size === 0) {
      logger.warn("No subscriber topics found; nothing to discover");
      return { ...result, status: "no_topics" };
    }
    logger.info("Found unique subscriber topics", { topics: [...topics] });

    // Per-topic searches are independent; their results merge by set union.
    const searches = await Promise.allSettled(
      [...topics].map(async (topic) => {
        const query = buildSearchQuery(settings.discovery.queryTemplate, topic);
        const start = performance.now();
        try {
          const urls = await deps.search.search(
            query,
            settings.discovery.resultsPerTopic,
          );
          logExternalCall(logger, "google_cse", "search", performance.now() - start);
          return urls;
        } catch (err) {
          logExternalCall(
            logger,
            "google_cse",
            "search",
            performance.now() - start,
            errorMessage(err),
          );
          throw err;
        }
      }),
    );

    const found = new Set<string>();
    searches.forEach((outcome, i) => {
      const topic = [...topics][i];
      if (outcome.status === "fulfilled") {
        for (const url of outcome.value) found.add(url);
      } else {
        result.failedTopics.push(topic);
        logger.error("Search failed for topic", {
          topic,
          error: errorMessage(outcome.reason),
        });
      }
    });

    result.urlsFound = found.size;
    if (found.size === 0) {
      logger.warn("Search did not return any URLs");
      result.status = "no_results";
      await deps.analytics.record("discovery_completed", toDetails(result));
      return result;
    }
    logger.info("Found total URLs from search", { count: found.size });

    const fresh = await filterNew(deps.store, found);
    result.alreadyStored = found.size - fresh.size;
    logger.info("Queuing new URLs for crawling", {
      count: fresh.size,
      alreadyStored: result.alreadyStored,
    });

    for (const url of fresh) {
      try {
        await deps.queue.enqueue(url);
        result.queued++;
      } catch (err) {
        result.enqueueFailures++;
        logger.error("Failed to enqueue URL", { url, error: errorMessage(err) });
      }
    }

    await deps.analytics.record("discovery_completed", toDetails(result));
    logger.info("Discovery completed", { ...result });
    return result;
  } catch (err) {
    const error = errorMessage(err);
    logger.error("Unexpected error during discovery", { error });
    const failed: DiscoveryResult = { ...result, status: "failed", error };
    try {
      await deps.analytics.record("discovery_failed", toDetails(failed));
    } catch (recordErr) {
      logger.error("Failed to record discovery failure", {
        error: errorMessage(recordErr),
      });
    }
    return failed;
  }
}

function toDetails(result: DiscoveryResult): Record<string, unknown> {
  return {
    status: result.status,
    topics: result.topics,
    urls_found: result.urlsFound,
    already_stored: result.alreadyStored,
    queued: result.queued,
    enqueue_failures: result.enqueueFailures,
    failed_topics: result.failedTopics,
    ...(result.error !== undefined ? { error: result.error } : {}),
  };
}
