// =============================================================================
// @topicwire/worker: Heuristic article extraction
// =============================================================================
// Article text is located with an ordered list of strategies, narrowest
// container first: the first strategy that yields non-empty text wins, and
// the whole page's visible text is the last resort. Each strategy is a pure
// function of the parsed document so it can be tested and reordered alone.
// =============================================================================

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText, type AnyNode } from "domhandler";

export const NO_TITLE = "No Title Found";

/** Elements whose text is never visible on the rendered page. */
const INVISIBLE_TAGS = new Set(["script", "style", "noscript", "template"]);

export interface ExtractionStrategy {
  name: string;
  extract: (doc: CheerioAPI) => string | null;
}

export interface ParsedArticle {
  title: string;
  text: string;
  /** Name of the strategy that produced `text` */
  strategy: string;
}

// ---------------------------------------------------------------------------
// Text collection
// ---------------------------------------------------------------------------

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const text = node.data.trim();
    if (text) out.push(text);
    return;
  }
  if (isTag(node) && INVISIBLE_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

/** Trimmed, non-empty text nodes under `node`, one per line. */
export function visibleText(node: AnyNode): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts.join("\n");
}

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

/** Text of the first element matching `selector`, or null when absent/empty. */
export function selectorStrategy(selector: string): ExtractionStrategy {
  return {
    name: selector,
    extract: ($) => {
      const element = $(selector).get(0);
      if (!element) return null;
      return visibleText(element) || null;
    },
  };
}

export const fullPageStrategy: ExtractionStrategy = {
  name: "full-page",
  extract: ($) => {
    const root = $.root().get(0);
    if (!root) return null;
    return visibleText(root) || null;
  },
};

export const CONTENT_SELECTORS = [
  "article",
  "main",
  ".post-content",
  ".article-body",
  "#content",
] as const;

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  ...CONTENT_SELECTORS.map(selectorStrategy),
  fullPageStrategy,
];

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export function extractTitle($: CheerioAPI): string {
  const title = $("title").first().text().trim();
  return title || NO_TITLE;
}

/** Runs the strategies in order; null when none yields text. */
export function extractText(
  $: CheerioAPI,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): { text: string; strategy: string } | null {
  for (const strategy of strategies) {
    const text = strategy.extract($);
    if (text) return { text, strategy: strategy.name };
  }
  return null;
}

/** Parses `html` once and extracts title and body text. */
export function parseArticle(
  html: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): ParsedArticle | null {
  const $ = cheerio.load(html);
  const extracted = extractText($, strategies);
  if (!extracted) return null;
  return { title: extractTitle($), ...extracted };
}

/**
 * Placeholder preview: the first `lines` lines joined by spaces, plus "...".
 */
export function buildSummary(text: string, lines: number = 15): string {
  return text.split(/\r\n|\r|\n/).slice(0, lines).join(" ") + "...";
}
