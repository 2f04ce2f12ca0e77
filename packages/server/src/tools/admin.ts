// =============================================================================
// @topicwire/server: Admin tools (health_check, pipeline_stats)
// =============================================================================

import { type McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage, logToolCall } from "@topicwire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";

export interface PipelineStats {
  articles: number;
  unprocessed: number;
  queued: number;
  timestamp: string;
}

export async function collectPipelineStats(
  deps: Pick<AppDependencies, "store" | "queue">,
): Promise<PipelineStats> {
  const [articles, unprocessed, queued] = await Promise.all([
    deps.store.count(),
    deps.store.count({ processed: false }),
    deps.queue.size(),
  ]);
  return { articles, unprocessed, queued, timestamp: new Date().toISOString() };
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerAdminTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { logger } = deps;

  // -------------------------------------------------------------------------
  // health_check: Neo4j connectivity
  // -------------------------------------------------------------------------
  server.tool("health_check", {}, async () => {
    const start = performance.now();
    try {
      const neo4jResult = await deps.checkHealth();
      const result = {
        status: neo4jResult.ok ? "ok" : "unhealthy",
        neo4j: neo4jResult,
        uptime: process.uptime(),
      };

      const durationMs = performance.now() - start;
      logToolCall(logger, "health_check", {}, durationMs);

      return {
        content: [
          { type: "text" as const, text: JSON.stringify(result, null, 2) },
        ],
      };
    } catch (err) {
      const durationMs = performance.now() - start;
      const errorMsg = errorMessage(err);
      logToolCall(logger, "health_check", {}, durationMs, errorMsg);

      return {
        content: [
          { type: "text" as const, text: `Health check failed: ${errorMsg}` },
        ],
        isError: true,
      };
    }
  });

  // -------------------------------------------------------------------------
  // pipeline_stats: article, backlog and queue counts
  // -------------------------------------------------------------------------
  server.tool("pipeline_stats", {}, async () => {
    const start = performance.now();
    try {
      const result = await collectPipelineStats(deps);
      const durationMs = performance.now() - start;
      logToolCall(logger, "pipeline_stats", {}, durationMs);

      return {
        content: [
          { type: "text" as const, text: JSON.stringify(result, null, 2) },
        ],
      };
    } catch (err) {
      const durationMs = performance.now() - start;
      const errorMsg = errorMessage(err);
      logToolCall(logger, "pipeline_stats", {}, durationMs, errorMsg);

      return {
        content: [
          { type: "text" as const, text: `Pipeline stats failed: ${errorMsg}` },
        ],
        isError: true,
      };
    }
  });
};
