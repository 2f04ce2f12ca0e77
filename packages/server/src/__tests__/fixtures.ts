// In-process dependencies for server tests: in-memory storage ports, a
// scripted search client and a fixed clock. No Neo4j, no network.

import {
  createInMemoryAnalyticsLog,
  createInMemoryArticleStore,
  createInMemorySubscriberDirectory,
  createInMemoryTaskQueue,
  loadConfig,
  toPipelineSettings,
  silentLogger,
  type Subscriber,
} from "@topicwire/shared";
import type { AppDependencies } from "../server.js";
import type { SearchClient } from "../pipeline/search.js";

export const TEST_ENV = {
  NEO4J_URI: "bolt://localhost:7687",
  NEO4J_USER: "neo4j",
  NEO4J_PASSWORD: "test-secret",
  API_KEYS: '{"test-key":"test-client"}',
  CRON_ENABLED: "false",
};

/** Search results per query; a query mapped to an Error rejects. */
export function scriptedSearch(
  results: Record<string, string[] | Error>,
): SearchClient & { queries: string[] } {
  const queries: string[] = [];
  return {
    queries,
    async search(query, limit) {
      queries.push(query);
      const result = results[query];
      if (result instanceof Error) throw result;
      return (result ?? []).slice(0, limit);
    },
  };
}

export interface TestDependencies extends AppDependencies {
  store: ReturnType<typeof createInMemoryArticleStore>;
  analytics: ReturnType<typeof createInMemoryAnalyticsLog>;
}

export function createTestDependencies(
  options: {
    subscribers?: Subscriber[];
    search?: SearchClient;
    env?: Record<string, string>;
    clock?: () => number;
  } = {},
): TestDependencies {
  const config = loadConfig({ ...TEST_ENV, ...options.env });
  const settings = toPipelineSettings(config);
  const clock = options.clock ?? Date.now;

  return {
    store: createInMemoryArticleStore({ clock }),
    analytics: createInMemoryAnalyticsLog({ clock }),
    subscribers: createInMemorySubscriberDirectory(options.subscribers ?? []),
    queue: createInMemoryTaskQueue(settings.queue, { clock }),
    search: options.search ?? scriptedSearch({}),
    settings,
    logger: silentLogger,
    config,
    checkHealth: async () => ({ ok: true, latencyMs: 1 }),
  };
}
