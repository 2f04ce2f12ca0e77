// =============================================================================
// @topicwire/shared: Article Neo4j operations
// =============================================================================
// Insert, existence lookup, processed-flag and archival operations on
// :Article nodes. Link uniqueness is enforced by the article_link_unique
// constraint (see schema.ts); MERGE on the constrained property lets the
// database arbitrate concurrent inserts of the same link.
// =============================================================================

import crypto from "node:crypto";
import { Neo4jError } from "neo4j-driver";
import {
  toInt,
  toNumber,
  withSession,
  type Driver,
  type Session,
} from "./driver.js";
import type { ArticleDraft, ArticleStore, InsertResult } from "../types.js";

const CONSTRAINT_VIOLATION = "Neo.ClientError.Schema.ConstraintValidationFailed";

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * Creates an :Article unless one with the same link exists. The returned id
 * is the new node's id or the existing node's id.
 */
export async function insertArticle(
  session: Session,
  draft: ArticleDraft,
): Promise<InsertResult> {
  const id = crypto.randomUUID();
  const createdAt = new Date().toISOString();

  try {
    const result = await session.executeWrite(async (tx) => {
      return tx.run(
        `MERGE (a:Article {link: $link})
         ON CREATE SET
           a.id = $id,
           a.title = $title,
           a.summary = $summary,
           a.content = $content,
           a.tags = $tags,
           a.source = $source,
           a.published = $published,
           a.created_at = $created_at,
           a.processed = $processed
         RETURN a.id AS id`,
        {
          id,
          link: draft.link,
          title: draft.title,
          summary: draft.summary,
          content: draft.content ?? null,
          tags: draft.tags ?? null,
          source: draft.source,
          published: draft.published,
          created_at: createdAt,
          processed: draft.processed,
        },
      );
    });

    const storedId = result.records[0].get("id") as string;
    return storedId === id
      ? { status: "created", id }
      : { status: "already_exists", id: storedId };
  } catch (err) {
    // Two MERGEs racing on an unlocked link: the loser trips the constraint.
    if (err instanceof Neo4jError && err.code === CONSTRAINT_VIOLATION) {
      const existing = await findArticleId(session, draft.link);
      if (existing) return { status: "already_exists", id: existing };
    }
    throw err;
  }
}

async function findArticleId(
  session: Session,
  link: string,
): Promise<string | null> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (a:Article {link: $link}) RETURN a.id AS id`, {
      link,
    });
  });
  if (result.records.length === 0) return null;
  return result.records[0].get("id") as string;
}

/** One query for the whole candidate batch. */
export async function findExistingLinks(
  session: Session,
  links: string[],
): Promise<Set<string>> {
  if (links.length === 0) return new Set();

  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (a:Article)
       WHERE a.link IN $links
       RETURN a.link AS link`,
      { links },
    );
  });

  return new Set(result.records.map((r) => r.get("link") as string));
}

export async function countProcessedBefore(
  session: Session,
  cutoff: string,
): Promise<number> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (a:Article)
       WHERE a.processed = true AND a.created_at < $cutoff
       RETURN count(a) AS count`,
      { cutoff },
    );
  });
  return toNumber(result.records[0]?.get("count"));
}

export async function deleteProcessedBefore(
  session: Session,
  cutoff: string,
  limit: number,
): Promise<number> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (a:Article)
       WHERE a.processed = true AND a.created_at < $cutoff
       WITH a LIMIT $limit
       DETACH DELETE a
       RETURN count(*) AS deleted`,
      { cutoff, limit: toInt(limit) },
    );
  });
  return toNumber(result.records[0]?.get("deleted"));
}

export async function markArticlesProcessed(
  session: Session,
  links: string[],
): Promise<number> {
  if (links.length === 0) return 0;

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (a:Article)
       WHERE a.link IN $links AND a.processed = false
       SET a.processed = true
       RETURN count(a) AS updated`,
      { links },
    );
  });
  return toNumber(result.records[0]?.get("updated"));
}

export async function countArticles(
  session: Session,
  filter: { processed?: boolean } = {},
): Promise<number> {
  const where =
    filter.processed !== undefined ? "WHERE a.processed = $processed" : "";
  const params: Record<string, unknown> = {};
  if (filter.processed !== undefined) params.processed = filter.processed;

  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (a:Article)
       ${where}
       RETURN count(a) AS count`,
      params,
    );
  });
  return toNumber(result.records[0]?.get("count"));
}

// ---------------------------------------------------------------------------
// Store adapter
// ---------------------------------------------------------------------------

/** ArticleStore backed by Neo4j; opens a session per call. */
export function createNeo4jArticleStore(driver: Driver): ArticleStore {
  return {
    insert: (draft) => withSession(driver, (s) => insertArticle(s, draft)),
    findExistingLinks: (links) =>
      withSession(driver, (s) => findExistingLinks(s, [...links])),
    countProcessedBefore: (cutoff) =>
      withSession(driver, (s) => countProcessedBefore(s, cutoff)),
    deleteProcessedBefore: (cutoff, limit) =>
      withSession(driver, (s) => deleteProcessedBefore(s, cutoff, limit)),
    markProcessed: (links) =>
      withSession(driver, (s) => markArticlesProcessed(s, [...links])),
    count: (filter) => withSession(driver, (s) => countArticles(s, filter)),
  };
}
