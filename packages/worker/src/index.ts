// =============================================================================
// @topicwire/worker: Entry point
// =============================================================================
// Consumes crawl tasks from the Neo4j-backed queue until SIGTERM/SIGINT.
// Scale out by running more worker processes or raising WORKER_CONCURRENCY;
// workers do not coordinate beyond the queue and the link constraint.
//
// Pass --drain to exit once no task is visible. Tasks released with a retry
// delay stay queued for a later run.
// =============================================================================

import {
  loadConfig,
  toPipelineSettings,
  createLogger,
  createDriver,
  closeDriver,
  ensureSchema,
  createNeo4jArticleStore,
  createNeo4jTaskQueue,
  errorMessage,
} from "@topicwire/shared";
import { createBrowserPageFetcher } from "./fetcher.js";
import { processCrawlTask } from "./crawl.js";
import { runConsumer } from "./consumer.js";

const config = loadConfig();
const settings = toPipelineSettings(config);
const logger = createLogger({ level: config.LOG_LEVEL }).child({
  component: "crawl-worker",
});
const driver = createDriver(config);

const store = createNeo4jArticleStore(driver);
const queue = createNeo4jTaskQueue(driver, settings.queue);
const fetcher = createBrowserPageFetcher({
  executablePath: config.CHROME_EXECUTABLE_PATH,
});

const controller = new AbortController();

function handleShutdown() {
  logger.info("Shutting down gracefully...");
  controller.abort();
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);

try {
  await ensureSchema(driver, logger);

  await runConsumer(
    queue,
    (url) =>
      processCrawlTask(url, {
        fetcher,
        store,
        settings: settings.crawl,
        logger,
      }),
    {
      concurrency: settings.queue.concurrency,
      pollIntervalMs: settings.queue.pollIntervalMs,
      failurePolicy: settings.crawl.failurePolicy,
      logger,
      signal: controller.signal,
      exitWhenEmpty: process.argv.includes("--drain"),
    },
  );
} catch (err) {
  logger.fatal("Worker failed", { error: errorMessage(err) });
  process.exitCode = 1;
} finally {
  await closeDriver(driver);
}
