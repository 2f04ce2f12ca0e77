import { describe, it, expect } from "vitest";
import { runArchival, retentionCutoff } from "../archival.js";
import { createTestDependencies } from "../../__tests__/fixtures.js";

const DAY_MS = 86_400_000;
const NOW = Date.UTC(2026, 5, 1);

function clockAt(start: number) {
  let now = start;
  return {
    clock: () => now,
    set: (t: number) => {
      now = t;
    },
  };
}

async function seed(
  deps: ReturnType<typeof createTestDependencies>,
  time: ReturnType<typeof clockAt>,
  link: string,
  ageDays: number,
  processed: boolean,
): Promise<void> {
  time.set(NOW - ageDays * DAY_MS);
  await deps.store.insert({
    title: link,
    link,
    summary: "",
    source: "intelligent_crawler",
    published: new Date(NOW - ageDays * DAY_MS).toISOString(),
    processed,
  });
}

describe("retentionCutoff", () => {
  it("should subtract whole days from now", () => {
    expect(retentionCutoff(NOW, 90)).toBe("2026-03-03T00:00:00.000Z");
  });
});

describe("runArchival", () => {
  it("should delete only processed articles older than the retention window", async () => {
    const time = clockAt(NOW);
    const deps = createTestDependencies({ clock: time.clock });
    await seed(deps, time, "https://example.com/old-processed", 100, true);
    await seed(deps, time, "https://example.com/old-unprocessed", 100, false);
    await seed(deps, time, "https://example.com/recent-processed", 10, true);

    const result = await runArchival(deps, { now: NOW });

    expect(result).toMatchObject({
      status: "completed",
      articlesDeleted: 1,
      articleCutoff: "2026-03-03T00:00:00.000Z",
    });
    expect(deps.store.list().map((a) => a.link).sort()).toEqual([
      "https://example.com/old-unprocessed",
      "https://example.com/recent-processed",
    ]);
  });

  it("should keep an article created exactly at the cutoff", async () => {
    const time = clockAt(NOW);
    const deps = createTestDependencies({ clock: time.clock });
    await seed(deps, time, "https://example.com/edge", 90, true);

    const result = await runArchival(deps, { now: NOW });

    expect(result.articlesDeleted).toBe(0);
    expect(deps.store.list()).toHaveLength(1);
  });

  it("should delete old analytics events of every type and record the run", async () => {
    const deps = createTestDependencies();
    await deps.analytics.record("discovery_completed", {}, "2025-01-01T00:00:00.000Z");
    await deps.analytics.record("crawl_failed", {}, "2025-02-01T00:00:00.000Z");
    await deps.analytics.record("discovery_completed", {}, "2026-05-01T00:00:00.000Z");

    const result = await runArchival(deps, { now: NOW });

    expect(result.eventsDeleted).toBe(2);
    expect(result.analyticsCutoff).toBe("2025-12-03T00:00:00.000Z");
    const events = deps.analytics.list();
    expect(events.map((e) => e.event_type)).toEqual([
      "discovery_completed",
      "archival_completed",
    ]);
    expect(events[1].details).toEqual({
      articles_deleted: 0,
      analytics_events_deleted: 2,
      article_cutoff: "2026-03-03T00:00:00.000Z",
      analytics_cutoff: "2025-12-03T00:00:00.000Z",
    });
  });

  it("should work through the backlog in batches", async () => {
    const time = clockAt(NOW);
    const deps = createTestDependencies({
      clock: time.clock,
      env: { ARCHIVAL_BATCH_SIZE: "2" },
    });
    for (let i = 0; i < 5; i++) {
      await seed(deps, time, `https://example.com/${i}`, 120, true);
    }
    const batches: number[] = [];
    const deleteBatch = deps.store.deleteProcessedBefore;
    deps.store.deleteProcessedBefore = async (cutoff, limit) => {
      const deleted = await deleteBatch(cutoff, limit);
      batches.push(deleted);
      return deleted;
    };

    const result = await runArchival(deps, { now: NOW });

    expect(result.articlesDeleted).toBe(5);
    expect(batches).toEqual([2, 2, 1]);
  });

  it("should keep the counts accumulated before a failing batch", async () => {
    const time = clockAt(NOW);
    const deps = createTestDependencies({
      clock: time.clock,
      env: { ARCHIVAL_BATCH_SIZE: "2" },
    });
    for (let i = 0; i < 5; i++) {
      await seed(deps, time, `https://example.com/${i}`, 120, true);
    }
    const deleteBatch = deps.store.deleteProcessedBefore;
    let calls = 0;
    deps.store.deleteProcessedBefore = async (cutoff, limit) => {
      calls++;
      if (calls === 2) throw new Error("TransientError");
      return deleteBatch(cutoff, limit);
    };

    const result = await runArchival(deps, { now: NOW });

    expect(result).toMatchObject({
      status: "failed",
      articlesDeleted: 2,
      eventsDeleted: 0,
      error: "TransientError",
    });
    const [event] = deps.analytics.list();
    expect(event.event_type).toBe("archival_failed");
    expect(event.details).toMatchObject({
      articles_deleted: 2,
      error: "TransientError",
    });
  });

  it("should only count in a dry run", async () => {
    const time = clockAt(NOW);
    const deps = createTestDependencies({ clock: time.clock });
    await seed(deps, time, "https://example.com/old", 100, true);
    await deps.analytics.record("discovery_completed", {}, "2025-01-01T00:00:00.000Z");

    const result = await runArchival(deps, { now: NOW, dryRun: true });

    expect(result).toMatchObject({
      status: "completed",
      dryRun: true,
      articlesDeleted: 1,
      eventsDeleted: 1,
    });
    expect(deps.store.list()).toHaveLength(1);
    expect(deps.analytics.list()).toHaveLength(1);
  });
});
