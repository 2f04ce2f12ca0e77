// =============================================================================
// @topicwire/server: Pipeline tools (discovery, archival, manual producers)
// =============================================================================
// Registers MCP tools for pipeline orchestration:
// - run_discovery: one discovery pass (topics -> search -> dedup -> enqueue)
// - run_archival: one retention sweep, optionally as a dry run
// - enqueue_urls: put operator-supplied URLs on the crawl queue
// - submit_article: store an article directly, bypassing the crawler
//
// The pipelines themselves live in ../pipeline so the cron scheduler can
// call them without going through MCP.
// =============================================================================

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  EnqueueUrlsInput,
  RunArchivalInput,
  SubmitArticleInput,
  errorMessage,
  filterNew,
  logToolCall,
  type InsertResult,
} from "@topicwire/shared";
import type { ToolRegistrar, AppDependencies } from "../server.js";
import { runDiscovery } from "../pipeline/discovery.js";
import { runArchival } from "../pipeline/archival.js";

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface EnqueueUrlsResult {
  requested: number;
  alreadyStored: number;
  queued: number;
  failed: Array<{ url: string; error: string }>;
}

export interface SubmitArticleResult {
  status: InsertResult["status"];
  id: string;
  link: string;
}

// ---------------------------------------------------------------------------
// Standalone operations
// ---------------------------------------------------------------------------

export async function enqueueUrls(
  deps: Pick<AppDependencies, "store" | "queue" | "logger">,
  urls: readonly string[],
): Promise<EnqueueUrlsResult> {
  const requested = new Set(urls);
  const fresh = await filterNew(deps.store, requested);
  const result: EnqueueUrlsResult = {
    requested: requested.size,
    alreadyStored: requested.size - fresh.size,
    queued: 0,
    failed: [],
  };

  for (const url of fresh) {
    try {
      await deps.queue.enqueue(url);
      result.queued++;
    } catch (err) {
      const error = errorMessage(err);
      deps.logger.error("Failed to enqueue URL", { url, error });
      result.failed.push({ url, error });
    }
  }

  return result;
}

export async function submitArticle(
  deps: Pick<AppDependencies, "store">,
  input: {
    title: string;
    link: string;
    summary?: string;
    content?: string;
    tags?: string[];
  },
  now: Date = new Date(),
): Promise<SubmitArticleResult> {
  const inserted = await deps.store.insert({
    title: input.title,
    link: input.link,
    summary: input.summary ?? "",
    content: input.content,
    tags: input.tags,
    source: "manual",
    published: now.toISOString(),
    processed: false,
  });
  return { status: inserted.status, id: inserted.id, link: input.link };
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function jsonContent(result: unknown, isError = false) {
  return {
    content: [
      { type: "text" as const, text: JSON.stringify(result, null, 2) },
    ],
    isError,
  };
}

function errorContent(errorMsg: string) {
  return {
    content: [{ type: "text" as const, text: `Error: ${errorMsg}` }],
    isError: true,
  };
}

// ---------------------------------------------------------------------------
// Tool registrar
// ---------------------------------------------------------------------------

export const registerPipelineTools: ToolRegistrar = (
  server: McpServer,
  deps: AppDependencies,
) => {
  const { logger } = deps;

  // -------------------------------------------------------------------------
  // run_discovery
  // -------------------------------------------------------------------------
  server.tool("run_discovery", {}, async () => {
    const start = performance.now();
    const result = await runDiscovery(deps);
    const durationMs = performance.now() - start;
    logToolCall(logger, "run_discovery", {}, durationMs, result.error);
    return jsonContent(result, result.status === "failed");
  });

  // -------------------------------------------------------------------------
  // run_archival
  // -------------------------------------------------------------------------
  server.tool("run_archival", RunArchivalInput.shape, async (input) => {
    const start = performance.now();
    const result = await runArchival(deps, { dryRun: input.dry_run });
    const durationMs = performance.now() - start;
    logToolCall(logger, "run_archival", input, durationMs, result.error);
    return jsonContent(result, result.status === "failed");
  });

  // -------------------------------------------------------------------------
  // enqueue_urls
  // -------------------------------------------------------------------------
  server.tool("enqueue_urls", EnqueueUrlsInput.shape, async (input) => {
    const start = performance.now();

    try {
      const result = await enqueueUrls(deps, input.urls);
      const durationMs = performance.now() - start;
      logToolCall(logger, "enqueue_urls", { count: input.urls.length }, durationMs);
      return jsonContent(result);
    } catch (err) {
      const errorMsg = errorMessage(err);
      const durationMs = performance.now() - start;
      logToolCall(
        logger,
        "enqueue_urls",
        { count: input.urls.length },
        durationMs,
        errorMsg,
      );
      return errorContent(errorMsg);
    }
  });

  // -------------------------------------------------------------------------
  // submit_article
  // -------------------------------------------------------------------------
  server.tool("submit_article", SubmitArticleInput.shape, async (input) => {
    const start = performance.now();
    const logged = { link: input.link, title: input.title };

    try {
      const result = await submitArticle(deps, input);
      const durationMs = performance.now() - start;
      logToolCall(logger, "submit_article", logged, durationMs);
      return jsonContent(result);
    } catch (err) {
      const errorMsg = errorMessage(err);
      const durationMs = performance.now() - start;
      logToolCall(logger, "submit_article", logged, durationMs, errorMsg);
      return errorContent(errorMsg);
    }
  });
};
