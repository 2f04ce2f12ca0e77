// =============================================================================
// @topicwire/shared: In-process backends
// =============================================================================
// Single-process implementations of the storage ports with the same
// semantics as the Neo4j ones: link uniqueness, lease-based at-least-once
// delivery with stale-receipt protection, strict "older than" cutoffs.
// Used for local dry runs and by the test suites. Clocks are injectable.
// =============================================================================

import crypto from "node:crypto";
import type {
  AnalyticsEvent,
  AnalyticsLog,
  Article,
  ArticleStore,
  QueueDelivery,
  Subscriber,
  SubscriberDirectory,
  TaskQueue,
} from "./types.js";
import type { QueueSettings } from "./config.js";
import { QueueMessageSchema } from "./schemas.js";

export type Clock = () => number;

// ---------------------------------------------------------------------------
// Articles
// ---------------------------------------------------------------------------

export interface InMemoryArticleStore extends ArticleStore {
  list(): Article[];
}

export function createInMemoryArticleStore(
  options: { clock?: Clock } = {},
): InMemoryArticleStore {
  const clock = options.clock ?? Date.now;
  const byLink = new Map<string, Article>();

  function processedBefore(cutoff: string): Article[] {
    return [...byLink.values()].filter(
      (a) => a.processed && a.created_at < cutoff,
    );
  }

  return {
    async insert(draft) {
      const existing = byLink.get(draft.link);
      if (existing) return { status: "already_exists", id: existing.id };

      const article: Article = {
        ...draft,
        id: crypto.randomUUID(),
        created_at: new Date(clock()).toISOString(),
      };
      byLink.set(article.link, article);
      return { status: "created", id: article.id };
    },

    async findExistingLinks(links) {
      const found = new Set<string>();
      for (const link of links) {
        if (byLink.has(link)) found.add(link);
      }
      return found;
    },

    async countProcessedBefore(cutoff) {
      return processedBefore(cutoff).length;
    },

    async deleteProcessedBefore(cutoff, limit) {
      const batch = processedBefore(cutoff).slice(0, limit);
      for (const article of batch) byLink.delete(article.link);
      return batch.length;
    },

    async markProcessed(links) {
      let updated = 0;
      for (const link of links) {
        const article = byLink.get(link);
        if (article && !article.processed) {
          article.processed = true;
          updated++;
        }
      }
      return updated;
    },

    async count(filter = {}) {
      return [...byLink.values()].filter(
        (a) =>
          filter.processed === undefined || a.processed === filter.processed,
      ).length;
    },

    list: () => [...byLink.values()].map((a) => ({ ...a })),
  };
}

// ---------------------------------------------------------------------------
// Analytics
// ---------------------------------------------------------------------------

export interface InMemoryAnalyticsLog extends AnalyticsLog {
  list(): AnalyticsEvent[];
}

export function createInMemoryAnalyticsLog(
  options: { clock?: Clock } = {},
): InMemoryAnalyticsLog {
  const clock = options.clock ?? Date.now;
  let events: AnalyticsEvent[] = [];

  return {
    async record(eventType, details, timestamp) {
      const event: AnalyticsEvent = {
        id: crypto.randomUUID(),
        event_type: eventType,
        details,
        timestamp: timestamp ?? new Date(clock()).toISOString(),
      };
      events.push(event);
      return event;
    },

    async countBefore(cutoff) {
      return events.filter((e) => e.timestamp < cutoff).length;
    },

    async deleteBefore(cutoff, limit) {
      const doomed = new Set(
        events
          .filter((e) => e.timestamp < cutoff)
          .slice(0, limit)
          .map((e) => e.id),
      );
      events = events.filter((e) => !doomed.has(e.id));
      return doomed.size;
    },

    list: () => events.map((e) => ({ ...e })),
  };
}

// ---------------------------------------------------------------------------
// Subscribers
// ---------------------------------------------------------------------------

export function createInMemorySubscriberDirectory(
  subscribers: Subscriber[],
): SubscriberDirectory {
  return {
    listTopicLists: async () => subscribers.map((s) => [...s.topics]),
  };
}

// ---------------------------------------------------------------------------
// Task queue
// ---------------------------------------------------------------------------

interface QueuedTask {
  id: string;
  url: string;
  visibleAt: number;
  deliveryCount: number;
  receipt: string | null;
}

export function createInMemoryTaskQueue(
  settings: Pick<QueueSettings, "visibilityTimeoutMs">,
  options: { clock?: Clock } = {},
): TaskQueue {
  const clock = options.clock ?? Date.now;
  const tasks = new Map<string, QueuedTask>();

  function current(delivery: QueueDelivery): QueuedTask | undefined {
    const task = tasks.get(delivery.id);
    return task && task.receipt === delivery.receipt ? task : undefined;
  }

  return {
    async enqueue(url) {
      const body = QueueMessageSchema.parse(url);
      const id = crypto.randomUUID();
      tasks.set(id, {
        id,
        url: body,
        visibleAt: clock(),
        deliveryCount: 0,
        receipt: null,
      });
    },

    async receive() {
      const now = clock();
      let next: QueuedTask | undefined;
      for (const task of tasks.values()) {
        if (task.visibleAt > now) continue;
        if (!next || task.visibleAt < next.visibleAt) next = task;
      }
      if (!next) return null;

      next.visibleAt = now + settings.visibilityTimeoutMs;
      next.deliveryCount++;
      next.receipt = crypto.randomUUID();
      return {
        id: next.id,
        url: next.url,
        deliveryCount: next.deliveryCount,
        receipt: next.receipt,
      };
    },

    async ack(delivery) {
      if (!current(delivery)) return false;
      tasks.delete(delivery.id);
      return true;
    },

    async release(delivery, delayMs) {
      const task = current(delivery);
      if (!task) return false;
      task.visibleAt = clock() + delayMs;
      task.receipt = null;
      return true;
    },

    size: async () => tasks.size,
  };
}
