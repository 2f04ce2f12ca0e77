// =============================================================================
// @topicwire/server: Entry point
// =============================================================================
// Loads config, creates the Express + MCP server, ensures the Neo4j schema,
// starts the cron scheduler and starts listening.
// =============================================================================

import { ensureSchema, errorMessage } from "@topicwire/shared";
import { createApp } from "./server.js";
import { registerAdminTools } from "./tools/admin.js";
import { registerPipelineTools } from "./tools/pipeline.js";
import { startScheduler, type SchedulerHandle } from "./scheduler.js";

const instance = createApp();
const { httpServer, deps, driver, shutdown } = instance;

instance.addToolRegistrar(registerAdminTools);
instance.addToolRegistrar(registerPipelineTools);
const { config, logger } = deps;

// Constraints and indexes first (idempotent), then the scheduler. A schema
// failure is logged; the jobs still run and report their own errors.
let scheduler: SchedulerHandle | undefined;

ensureSchema(driver, logger)
  .catch((err: unknown) => {
    logger.error("Schema bootstrap failed (non-fatal)", {
      error: errorMessage(err),
    });
  })
  .finally(() => {
    scheduler = startScheduler(deps);
  });

httpServer.keepAliveTimeout = 120_000;
httpServer.headersTimeout = 120_000;

httpServer.listen(config.PORT, "0.0.0.0", () => {
  logger.info("Topicwire server started", {
    port: config.PORT,
    host: "0.0.0.0",
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGINS,
    rateLimitPerMin: config.RATE_LIMIT_PER_MIN,
  });
});

// Signal handlers registered here (not in createApp) to avoid accumulation
// if createApp is called multiple times.
function handleShutdown() {
  scheduler?.stop();
  shutdown()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error("Shutdown error", { error: errorMessage(err) });
      process.exit(1);
    });
}

process.once("SIGTERM", handleShutdown);
process.once("SIGINT", handleShutdown);
