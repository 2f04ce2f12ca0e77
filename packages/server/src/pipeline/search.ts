// =============================================================================
// @topicwire/server: Web search discovery client
// =============================================================================
// Topic-scoped candidate URLs from the Google Custom Search JSON API. The
// API serves at most 10 results per page, so larger limits page through
// `start`. Any non-2xx response or malformed body throws; the discovery
// pipeline decides what a failure means for the run.
// =============================================================================

import { z } from "zod";

const GOOGLE_SEARCH_ENDPOINT =
  "https://customsearch.googleapis.com/customsearch/v1";

/** The API refuses start > 91 (results are capped at 100). */
const MAX_START = 91;
const PAGE_SIZE = 10;

export interface SearchClient {
  search(query: string, limit: number): Promise<string[]>;
}

export class SearchRequestError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(
      status === 429
        ? "Search quota exceeded (HTTP 429)"
        : `Search request failed: HTTP ${status} ${body.slice(0, 200)}`.trim(),
    );
    this.name = "SearchRequestError";
    this.status = status;
  }
}

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
      }),
    )
    .optional(),
});

export interface GoogleSearchOptions {
  apiKey: string;
  searchEngineId: string;
  fetchImpl?: typeof fetch;
}

export function createGoogleSearchClient(
  options: GoogleSearchOptions,
): SearchClient {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async search(query, limit) {
      const urls: string[] = [];
      let start = 1;

      while (urls.length < limit && start <= MAX_START) {
        const num = Math.min(PAGE_SIZE, limit - urls.length);
        const params = new URLSearchParams({
          key: options.apiKey,
          cx: options.searchEngineId,
          q: query,
          num: String(num),
          start: String(start),
          fields: "items(link)",
        });

        const response = await fetchImpl(
          `${GOOGLE_SEARCH_ENDPOINT}?${params.toString()}`,
          { method: "GET" },
        );
        if (!response.ok) {
          throw new SearchRequestError(response.status, await response.text());
        }

        const data = SearchResponseSchema.parse(await response.json());
        const items = data.items ?? [];
        for (const item of items) {
          const link = item.link?.trim();
          if (link && /^https?:\/\//i.test(link) && !urls.includes(link)) {
            urls.push(link);
          }
        }

        if (items.length < num) break;
        start += num;
      }

      return urls.slice(0, limit);
    },
  };
}

export function buildSearchQuery(template: string, topic: string): string {
  return template.replaceAll("{topic}", topic);
}
