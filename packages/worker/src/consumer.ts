// =============================================================================
// @topicwire/worker: Queue consumer loop
// =============================================================================
// Each slot receives one message at a time, processes it, and then either
// acknowledges it or, under the "retry" failure policy, releases it back to
// the queue with exponential delay. Slots share nothing but the queue and
// the store. Receive/ack errors are logged and the slot keeps going.
// =============================================================================

import { setTimeout as sleep } from "node:timers/promises";
import {
  errorMessage,
  QueueMessageSchema,
  type FailurePolicy,
  type Logger,
  type QueueDelivery,
  type TaskQueue,
} from "@topicwire/shared";
import type { CrawlOutcome } from "./crawl.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CrawlHandler = (url: string) => Promise<CrawlOutcome>;

export type DeliveryDecision =
  | { action: "ack" }
  | { action: "release"; delayMs: number };

export interface ConsumerOptions {
  concurrency: number;
  pollIntervalMs: number;
  failurePolicy: FailurePolicy;
  logger: Logger;
  signal?: AbortSignal;
  /** Return once the queue has nothing visible instead of polling. */
  exitWhenEmpty?: boolean;
}

export interface ConsumerStats {
  received: number;
  created: number;
  duplicate: number;
  noContent: number;
  invalid: number;
  failed: number;
  released: number;
  dropped: number;
}

// ---------------------------------------------------------------------------
// Failure policy
// ---------------------------------------------------------------------------

/**
 * Everything is acknowledged except a retryable failure under the "retry"
 * policy that has attempts left; that one is released with a delay that
 * doubles on each delivery.
 */
export function decideDelivery(
  outcome: CrawlOutcome,
  deliveryCount: number,
  policy: FailurePolicy,
): DeliveryDecision {
  if (outcome.status !== "failed" || !outcome.retryable) return { action: "ack" };
  if (policy.mode !== "retry" || deliveryCount >= policy.maxAttempts) {
    return { action: "ack" };
  }
  return {
    action: "release",
    delayMs: policy.retryDelayMs * 2 ** (deliveryCount - 1),
  };
}

// ---------------------------------------------------------------------------
// Single delivery
// ---------------------------------------------------------------------------

export async function handleDelivery(
  queue: Pick<TaskQueue, "ack" | "release">,
  delivery: QueueDelivery,
  handler: CrawlHandler,
  policy: FailurePolicy,
  logger: Logger,
): Promise<{ outcome: CrawlOutcome; decision: DeliveryDecision }> {
  const log = logger.child({
    messageId: delivery.id,
    deliveryCount: delivery.deliveryCount,
  });

  const parsed = QueueMessageSchema.safeParse(delivery.url);
  let outcome: CrawlOutcome;
  if (parsed.success) {
    outcome = await handler(parsed.data);
  } else {
    const error = parsed.error.issues.map((i) => i.message).join("; ");
    log.error("Invalid queue message", { body: delivery.url, error });
    outcome = { status: "invalid", error };
  }

  const decision = decideDelivery(outcome, delivery.deliveryCount, policy);

  if (decision.action === "release") {
    await queue.release(delivery, decision.delayMs);
    log.warn("Crawl task released for retry", {
      url: delivery.url,
      delayMs: decision.delayMs,
    });
  } else {
    const acked = await queue.ack(delivery);
    if (!acked) {
      log.warn("Ack ignored: lease expired before processing finished", {
        url: delivery.url,
      });
    }
    if (outcome.status === "failed") {
      log.warn("Crawl task dropped", {
        url: delivery.url,
        stage: outcome.stage,
        error: outcome.error,
      });
    }
  }

  return { outcome, decision };
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

async function idle(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
}

function record(
  stats: ConsumerStats,
  outcome: CrawlOutcome,
  decision: DeliveryDecision,
): void {
  switch (outcome.status) {
    case "created":
      stats.created++;
      break;
    case "duplicate":
      stats.duplicate++;
      break;
    case "no_content":
      stats.noContent++;
      break;
    case "invalid":
      stats.invalid++;
      break;
    case "failed":
      stats.failed++;
      if (decision.action === "release") stats.released++;
      else stats.dropped++;
      break;
  }
}

export async function runConsumer(
  queue: TaskQueue,
  handler: CrawlHandler,
  options: ConsumerOptions,
): Promise<ConsumerStats> {
  const { logger, signal } = options;
  const stats: ConsumerStats = {
    received: 0,
    created: 0,
    duplicate: 0,
    noContent: 0,
    invalid: 0,
    failed: 0,
    released: 0,
    dropped: 0,
  };

  async function slot(index: number): Promise<void> {
    const log = logger.child({ slot: index });

    while (!signal?.aborted) {
      let delivery: QueueDelivery | null;
      try {
        delivery = await queue.receive();
      } catch (err) {
        log.error("Queue receive failed", { error: errorMessage(err) });
        await idle(options.pollIntervalMs, signal);
        continue;
      }

      if (!delivery) {
        if (options.exitWhenEmpty) return;
        await idle(options.pollIntervalMs, signal);
        continue;
      }

      stats.received++;
      try {
        const { outcome, decision } = await handleDelivery(
          queue,
          delivery,
          handler,
          options.failurePolicy,
          log,
        );
        record(stats, outcome, decision);
      } catch (err) {
        // Ack/release failed; the lease will expire and the task reappear.
        log.error("Queue acknowledgement failed", {
          messageId: delivery.id,
          error: errorMessage(err),
        });
      }
    }
  }

  logger.info("Consumer started", { concurrency: options.concurrency });
  await Promise.all(
    Array.from({ length: options.concurrency }, (_, i) => slot(i)),
  );
  logger.info("Consumer stopped", { ...stats });

  return stats;
}
