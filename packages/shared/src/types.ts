// =============================================================================
// @topicwire/shared: Domain types and storage ports
// =============================================================================
// Record shapes persisted by the pipeline plus the interfaces each storage
// backend (Neo4j, in-memory) implements. Pipelines depend on these ports only.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/** Provenance marker for an Article */
export type ArticleSource = "rss" | "intelligent_crawler" | "manual";

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface Article {
  id: string;
  title: string;
  /** Globally unique; the store rejects a second record with the same link */
  link: string;
  summary: string;
  content?: string;
  tags?: string[];
  source: ArticleSource;
  /** ISO-8601. Crawl time for crawled articles. */
  published: string;
  /** ISO-8601. Assigned by the store; drives archival cutoffs. */
  created_at: string;
  /** Monotonic false -> true, flipped by the downstream personalization stage */
  processed: boolean;
}

/** An Article before the store has assigned its id and creation time. */
export type ArticleDraft = Omit<Article, "id" | "created_at">;

export interface AnalyticsEvent {
  id: string;
  event_type: string;
  details: Record<string, unknown>;
  /** ISO-8601 */
  timestamp: string;
}

export interface Subscriber {
  email?: string;
  topics: string[];
}

// ---------------------------------------------------------------------------
// Result variants
// ---------------------------------------------------------------------------

export type InsertResult =
  | { status: "created"; id: string }
  | { status: "already_exists"; id: string };

// ---------------------------------------------------------------------------
// Storage ports
// ---------------------------------------------------------------------------

export interface ArticleStore {
  /** Exactly one insert per link reports "created"; the rest "already_exists". */
  insert(draft: ArticleDraft): Promise<InsertResult>;
  /** Single batched lookup; returns the subset of links already stored. */
  findExistingLinks(links: Iterable<string>): Promise<Set<string>>;
  countProcessedBefore(cutoff: string): Promise<number>;
  /** Deletes up to `limit` processed articles created before `cutoff`. */
  deleteProcessedBefore(cutoff: string, limit: number): Promise<number>;
  /** Flips processed to true. Never reverts. Returns how many changed. */
  markProcessed(links: Iterable<string>): Promise<number>;
  count(filter?: { processed?: boolean }): Promise<number>;
}

export interface AnalyticsLog {
  record(
    eventType: string,
    details: Record<string, unknown>,
    timestamp?: string,
  ): Promise<AnalyticsEvent>;
  countBefore(cutoff: string): Promise<number>;
  /** Deletes up to `limit` events older than `cutoff`, any type. */
  deleteBefore(cutoff: string, limit: number): Promise<number>;
}

export interface SubscriberDirectory {
  /** Each subscriber's topic list, nothing else. */
  listTopicLists(): Promise<string[][]>;
}

// ---------------------------------------------------------------------------
// Task queue
// ---------------------------------------------------------------------------

/** A leased queue message. `receipt` identifies this particular delivery. */
export interface QueueDelivery {
  id: string;
  url: string;
  deliveryCount: number;
  receipt: string;
}

/** Producer side of the crawl queue (discovery, manual triggers). */
export interface TaskProducer {
  enqueue(url: string): Promise<void>;
}

/**
 * At-least-once crawl queue. A received message stays invisible for the
 * visibility timeout; if it is not acked in that window it is delivered
 * again. Acks and releases carrying a stale receipt are ignored.
 */
export interface TaskQueue extends TaskProducer {
  receive(): Promise<QueueDelivery | null>;
  ack(delivery: QueueDelivery): Promise<boolean>;
  /** Makes the message visible again after `delayMs`. */
  release(delivery: QueueDelivery, delayMs: number): Promise<boolean>;
  /** Messages currently waiting or leased. */
  size(): Promise<number>;
}
