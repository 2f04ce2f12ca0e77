// =============================================================================
// @topicwire/shared: Idempotent Neo4j schema bootstrap
// =============================================================================
// Creates the uniqueness constraints and range indexes the pipeline relies
// on. Every statement uses IF NOT EXISTS, so it is safe on every boot.
// The article_link_unique constraint is what makes concurrent crawl workers
// unable to store the same link twice.
// =============================================================================

import type { Driver } from "./driver.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchemaStatement {
  name: string;
  cypher: string;
}

export interface SchemaResult {
  constraints: number;
  indexes: number;
}

export interface SchemaLogger {
  info: (msg: string, data?: Record<string, unknown>) => void;
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export const SCHEMA_CONSTRAINTS: readonly SchemaStatement[] = [
  {
    name: "article_link_unique",
    cypher: `CREATE CONSTRAINT article_link_unique IF NOT EXISTS
             FOR (a:Article) REQUIRE a.link IS UNIQUE`,
  },
  {
    name: "analytics_event_id_unique",
    cypher: `CREATE CONSTRAINT analytics_event_id_unique IF NOT EXISTS
             FOR (e:AnalyticsEvent) REQUIRE e.id IS UNIQUE`,
  },
  {
    name: "crawl_task_id_unique",
    cypher: `CREATE CONSTRAINT crawl_task_id_unique IF NOT EXISTS
             FOR (t:CrawlTask) REQUIRE t.id IS UNIQUE`,
  },
];

export const SCHEMA_INDEXES: readonly SchemaStatement[] = [
  {
    name: "article_created_at",
    cypher: `CREATE INDEX article_created_at IF NOT EXISTS
             FOR (a:Article) ON (a.created_at)`,
  },
  {
    name: "analytics_event_timestamp",
    cypher: `CREATE INDEX analytics_event_timestamp IF NOT EXISTS
             FOR (e:AnalyticsEvent) ON (e.timestamp)`,
  },
  {
    name: "crawl_task_visible_at",
    cypher: `CREATE INDEX crawl_task_visible_at IF NOT EXISTS
             FOR (t:CrawlTask) ON (t.visible_at)`,
  },
];

// ---------------------------------------------------------------------------
// Bootstrap
// ---------------------------------------------------------------------------

/**
 * Ensure constraints and indexes exist. Schema commands cannot share a
 * transaction with each other, so each runs in its own write.
 */
export async function ensureSchema(
  driver: Driver,
  logger: SchemaLogger = console,
): Promise<SchemaResult> {
  const result: SchemaResult = { constraints: 0, indexes: 0 };
  const session = driver.session();

  try {
    for (const statement of SCHEMA_CONSTRAINTS) {
      await session.executeWrite(async (tx) => {
        await tx.run(statement.cypher);
      });
      result.constraints++;
    }

    for (const statement of SCHEMA_INDEXES) {
      await session.executeWrite(async (tx) => {
        await tx.run(statement.cypher);
      });
      result.indexes++;
    }

    logger.info("Schema ensured", {
      constraints: SCHEMA_CONSTRAINTS.map((s) => s.name),
      indexes: SCHEMA_INDEXES.map((s) => s.name),
    });
    return result;
  } finally {
    await session.close();
  }
}
