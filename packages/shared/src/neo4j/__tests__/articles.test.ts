// =============================================================================
// Unit tests for Article Neo4j operations
// =============================================================================
// Uses a mock Neo4j session to verify Cypher queries and parameters
// without needing a live database connection.
// =============================================================================

import { describe, it, expect, vi, beforeEach } from "vitest";
import { newError } from "neo4j-driver-core";
import {
  insertArticle,
  findExistingLinks,
  countProcessedBefore,
  deleteProcessedBefore,
  markArticlesProcessed,
  countArticles,
} from "../articles.js";
import type { ArticleDraft } from "../../types.js";

// ---------------------------------------------------------------------------
// Mock session factory
// ---------------------------------------------------------------------------

interface MockTx {
  run: ReturnType<typeof vi.fn>;
}

function createMockSession() {
  const mockTx: MockTx = { run: vi.fn() };

  const session = {
    executeWrite: vi.fn(async (fn: (tx: MockTx) => Promise<unknown>) => {
      return fn(mockTx);
    }),
    executeRead: vi.fn(async (fn: (tx: MockTx) => Promise<unknown>) => {
      return fn(mockTx);
    }),
    close: vi.fn(),
  };

  return {
    session: session as unknown as import("../driver.js").Session,
    raw: session,
    mockTx,
  };
}

function mockRecord(data: Record<string, unknown>) {
  return {
    get: (key: string) => data[key],
  };
}

const DRAFT: ArticleDraft = {
  title: "Test Article",
  link: "https://example.com/a",
  summary: "line one line two...",
  content: "line one\nline two",
  source: "intelligent_crawler",
  published: "2026-01-01T00:00:00.000Z",
  processed: false,
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("article operations", () => {
  let session: import("../driver.js").Session;
  let raw: ReturnType<typeof createMockSession>["raw"];
  let mockTx: MockTx;

  beforeEach(() => {
    vi.clearAllMocks();
    const mock = createMockSession();
    session = mock.session;
    raw = mock.raw;
    mockTx = mock.mockTx;
  });

  describe("insertArticle", () => {
    it("should MERGE on link and report created when the new id comes back", async () => {
      mockTx.run.mockImplementation(async (_query, params) => ({
        records: [mockRecord({ id: params.id })],
      }));

      const result = await insertArticle(session, DRAFT);

      expect(result.status).toBe("created");
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("MERGE (a:Article {link: $link})");
      expect(query).toContain("ON CREATE SET");
      expect(params.link).toBe("https://example.com/a");
      expect(params.source).toBe("intelligent_crawler");
      expect(params.processed).toBe(false);
      expect(params.tags).toBeNull();
      expect(result.id).toBe(params.id);
    });

    it("should report already_exists with the stored id when the link is taken", async () => {
      mockTx.run.mockResolvedValue({
        records: [mockRecord({ id: "existing-id" })],
      });

      const result = await insertArticle(session, DRAFT);

      expect(result).toEqual({ status: "already_exists", id: "existing-id" });
    });

    it("should resolve a lost concurrent insert to the stored article", async () => {
      raw.executeWrite.mockRejectedValueOnce(
        newError(
          "Node already exists with label `Article` and property `link`",
          "Neo.ClientError.Schema.ConstraintValidationFailed",
        ),
      );
      mockTx.run.mockResolvedValue({
        records: [mockRecord({ id: "winner-id" })],
      });

      const result = await insertArticle(session, DRAFT);

      expect(result).toEqual({ status: "already_exists", id: "winner-id" });
      expect(raw.executeRead).toHaveBeenCalledTimes(1);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("MATCH (a:Article {link: $link})");
      expect(params).toEqual({ link: "https://example.com/a" });
    });

    it("should rethrow the constraint violation when no stored article is found", async () => {
      raw.executeWrite.mockRejectedValueOnce(
        newError(
          "Node already exists with label `Article` and property `link`",
          "Neo.ClientError.Schema.ConstraintValidationFailed",
        ),
      );
      mockTx.run.mockResolvedValue({ records: [] });

      await expect(insertArticle(session, DRAFT)).rejects.toThrow(
        "Node already exists with label `Article` and property `link`",
      );
      expect(raw.executeRead).toHaveBeenCalledTimes(1);
    });

    it("should rethrow errors that are not constraint violations", async () => {
      mockTx.run.mockRejectedValue(new Error("connection refused"));

      await expect(insertArticle(session, DRAFT)).rejects.toThrow(
        "connection refused",
      );
    });
  });

  describe("findExistingLinks", () => {
    it("should look up every candidate in one query", async () => {
      mockTx.run.mockResolvedValue({
        records: [mockRecord({ link: "https://example.com/b" })],
      });

      const found = await findExistingLinks(session, [
        "https://example.com/a",
        "https://example.com/b",
      ]);

      expect(found).toEqual(new Set(["https://example.com/b"]));
      expect(mockTx.run).toHaveBeenCalledTimes(1);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("a.link IN $links");
      expect(params.links).toEqual([
        "https://example.com/a",
        "https://example.com/b",
      ]);
    });

    it("should not query for an empty candidate list", async () => {
      const found = await findExistingLinks(session, []);

      expect(found.size).toBe(0);
      expect(raw.executeRead).not.toHaveBeenCalled();
    });
  });

  describe("archival queries", () => {
    it("should count only processed articles strictly before the cutoff", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ count: 4 })] });

      const count = await countProcessedBefore(session, "2026-01-01T00:00:00.000Z");

      expect(count).toBe(4);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("a.processed = true AND a.created_at < $cutoff");
      expect(params).toEqual({ cutoff: "2026-01-01T00:00:00.000Z" });
    });

    it("should delete one bounded batch with an integer limit", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ deleted: 2 })] });

      const deleted = await deleteProcessedBefore(
        session,
        "2026-01-01T00:00:00.000Z",
        500,
      );

      expect(deleted).toBe(2);
      expect(raw.executeWrite).toHaveBeenCalledTimes(1);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("WITH a LIMIT $limit");
      expect(query).toContain("DETACH DELETE a");
      expect(params.limit.toNumber()).toBe(500);
    });
  });

  describe("markArticlesProcessed", () => {
    it("should only flip articles that are still unprocessed", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ updated: 1 })] });

      const updated = await markArticlesProcessed(session, [
        "https://example.com/a",
      ]);

      expect(updated).toBe(1);
      const [query] = mockTx.run.mock.calls[0];
      expect(query).toContain("a.processed = false");
      expect(query).toContain("SET a.processed = true");
    });

    it("should return 0 without querying for no links", async () => {
      expect(await markArticlesProcessed(session, [])).toBe(0);
      expect(raw.executeWrite).not.toHaveBeenCalled();
    });
  });

  describe("countArticles", () => {
    it("should filter on processed when asked", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ count: 7 })] });

      const count = await countArticles(session, { processed: false });

      expect(count).toBe(7);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).toContain("WHERE a.processed = $processed");
      expect(params).toEqual({ processed: false });
    });

    it("should count everything without a filter", async () => {
      mockTx.run.mockResolvedValue({ records: [mockRecord({ count: 9 })] });

      expect(await countArticles(session)).toBe(9);
      const [query, params] = mockTx.run.mock.calls[0];
      expect(query).not.toContain("WHERE");
      expect(params).toEqual({});
    });
  });
});
