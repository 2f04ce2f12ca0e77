// =============================================================================
// @topicwire/shared: Crawl task queue on Neo4j
// =============================================================================
// At-least-once queue of :CrawlTask nodes. receive() leases the oldest
// visible task by pushing its visible_at forward by the visibility timeout
// and stamping a fresh receipt. ack() deletes the task only while the receipt
// still matches, so a worker whose lease expired cannot delete a task that
// has since been handed to someone else.
//
// Two consumers racing on the same task can both lease it; the later lease
// wins the receipt. Consumers are idempotent, so the double delivery is
// tolerated rather than prevented.
// =============================================================================

import crypto from "node:crypto";
import {
  toInt,
  toNumber,
  withSession,
  type Driver,
  type Session,
} from "./driver.js";
import type { QueueDelivery, TaskQueue } from "../types.js";
import type { QueueSettings } from "../config.js";
import { QueueMessageSchema } from "../schemas.js";

export async function enqueueCrawlTask(
  session: Session,
  url: string,
  now: number,
): Promise<string> {
  const id = crypto.randomUUID();

  await session.executeWrite(async (tx) => {
    await tx.run(
      `CREATE (t:CrawlTask {
        id: $id,
        url: $url,
        enqueued_at: $enqueued_at,
        visible_at: $visible_at,
        delivery_count: $delivery_count
      })`,
      {
        id,
        url,
        enqueued_at: new Date(now).toISOString(),
        visible_at: now,
        delivery_count: toInt(0),
      },
    );
  });

  return id;
}

export async function leaseCrawlTask(
  session: Session,
  now: number,
  visibilityTimeoutMs: number,
): Promise<QueueDelivery | null> {
  const receipt = crypto.randomUUID();

  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (t:CrawlTask)
       WHERE t.visible_at <= $now
       WITH t ORDER BY t.visible_at LIMIT 1
       SET t.visible_at = $lease_until,
           t.delivery_count = coalesce(t.delivery_count, 0) + 1,
           t.receipt = $receipt
       RETURN t.id AS id, t.url AS url, t.delivery_count AS delivery_count`,
      { now, lease_until: now + visibilityTimeoutMs, receipt },
    );
  });

  if (result.records.length === 0) return null;

  const record = result.records[0];
  return {
    id: record.get("id") as string,
    url: record.get("url") as string,
    deliveryCount: toNumber(record.get("delivery_count")),
    receipt,
  };
}

export async function deleteCrawlTask(
  session: Session,
  delivery: QueueDelivery,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (t:CrawlTask {id: $id, receipt: $receipt})
       DELETE t
       RETURN count(*) AS deleted`,
      { id: delivery.id, receipt: delivery.receipt },
    );
  });
  return toNumber(result.records[0]?.get("deleted")) > 0;
}

export async function releaseCrawlTask(
  session: Session,
  delivery: QueueDelivery,
  visibleAt: number,
): Promise<boolean> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (t:CrawlTask {id: $id, receipt: $receipt})
       SET t.visible_at = $visible_at, t.receipt = null
       RETURN count(*) AS released`,
      { id: delivery.id, receipt: delivery.receipt, visible_at: visibleAt },
    );
  });
  return toNumber(result.records[0]?.get("released")) > 0;
}

export async function countCrawlTasks(session: Session): Promise<number> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (t:CrawlTask) RETURN count(t) AS count`);
  });
  return toNumber(result.records[0]?.get("count"));
}

export function createNeo4jTaskQueue(
  driver: Driver,
  settings: Pick<QueueSettings, "visibilityTimeoutMs">,
  clock: () => number = Date.now,
): TaskQueue {
  return {
    enqueue: async (url) => {
      const body = QueueMessageSchema.parse(url);
      await withSession(driver, (s) => enqueueCrawlTask(s, body, clock()));
    },
    receive: () =>
      withSession(driver, (s) =>
        leaseCrawlTask(s, clock(), settings.visibilityTimeoutMs),
      ),
    ack: (delivery) => withSession(driver, (s) => deleteCrawlTask(s, delivery)),
    release: (delivery, delayMs) =>
      withSession(driver, (s) =>
        releaseCrawlTask(s, delivery, clock() + delayMs),
      ),
    size: () => withSession(driver, countCrawlTasks),
  };
}
