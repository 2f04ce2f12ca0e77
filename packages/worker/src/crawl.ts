// =============================================================================
// @topicwire/worker: Crawl task processing
// =============================================================================
// One queue message, one URL: fetch the rendered page, extract title and
// body, derive a summary, and insert the article. Every outcome, including
// failures, is returned as a value; nothing thrown here reaches the queue
// runtime. A duplicate link is a normal outcome, not an error.
// =============================================================================

import {
  errorMessage,
  logExternalCall,
  type ArticleDraft,
  type ArticleStore,
  type CrawlSettings,
  type InsertResult,
  type Logger,
} from "@topicwire/shared";
import {
  buildSummary,
  parseArticle,
  DEFAULT_STRATEGIES,
  type ExtractionStrategy,
} from "./extraction.js";
import { NavigationError, type PageFetcher } from "./fetcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CrawlOutcome =
  | { status: "created"; id: string; strategy: string }
  | { status: "duplicate"; id: string }
  | { status: "no_content"; reason: "empty_markup" | "empty_text" }
  | { status: "invalid"; error: string }
  | {
      status: "failed";
      stage: "fetch" | "store" | "process";
      error: string;
      retryable: boolean;
    };

export interface CrawlDependencies {
  fetcher: PageFetcher;
  store: Pick<ArticleStore, "insert">;
  settings: Pick<CrawlSettings, "navigationTimeoutMs" | "summaryLines">;
  logger: Logger;
  strategies?: readonly ExtractionStrategy[];
  clock?: () => number;
}

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

export async function processCrawlTask(
  url: string,
  deps: CrawlDependencies,
): Promise<CrawlOutcome> {
  const log = deps.logger.child({ url });
  const clock = deps.clock ?? Date.now;

  try {
    // Rendered markup
    let html: string;
    const start = performance.now();
    try {
      html = await deps.fetcher.fetchHtml(url, {
        timeoutMs: deps.settings.navigationTimeoutMs,
      });
      logExternalCall(log, "browser", "goto", performance.now() - start);
    } catch (err) {
      const error = errorMessage(err);
      logExternalCall(log, "browser", "goto", performance.now() - start, error);
      return {
        status: "failed",
        stage: "fetch",
        error,
        retryable: err instanceof NavigationError ? err.retryable : true,
      };
    }

    if (!html.trim()) {
      log.warn("No HTML content found");
      return { status: "no_content", reason: "empty_markup" };
    }

    // Title, body, summary
    const parsed = parseArticle(html, deps.strategies ?? DEFAULT_STRATEGIES);
    if (!parsed) {
      log.warn("No article text extracted");
      return { status: "no_content", reason: "empty_text" };
    }

    // Crawled pages carry no reliable publish date; use crawl time
    const draft: ArticleDraft = {
      title: parsed.title,
      link: url,
      summary: buildSummary(parsed.text, deps.settings.summaryLines),
      content: parsed.text,
      source: "intelligent_crawler",
      published: new Date(clock()).toISOString(),
      processed: false,
    };

    // The store decides uniqueness
    let result: InsertResult;
    try {
      result = await deps.store.insert(draft);
    } catch (err) {
      const error = errorMessage(err);
      log.error("Article insert failed", { error });
      return { status: "failed", stage: "store", error, retryable: true };
    }

    if (result.status === "already_exists") {
      log.warn("Article already exists, skipping", { id: result.id });
      return { status: "duplicate", id: result.id };
    }

    log.info("Inserted new article", {
      id: result.id,
      strategy: parsed.strategy,
    });
    return { status: "created", id: result.id, strategy: parsed.strategy };
  } catch (err) {
    const error = errorMessage(err);
    log.error("Unexpected error while crawling", { error });
    return { status: "failed", stage: "process", error, retryable: false };
  }
}
