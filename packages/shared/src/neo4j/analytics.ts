// =============================================================================
// @topicwire/shared: AnalyticsEvent Neo4j operations
// =============================================================================
// Append-only pipeline outcome records. Neo4j properties cannot hold nested
// maps, so `details` is stored as a JSON string.
// =============================================================================

import crypto from "node:crypto";
import {
  toInt,
  toNumber,
  withSession,
  type Driver,
  type Session,
} from "./driver.js";
import type { AnalyticsEvent, AnalyticsLog } from "../types.js";

export async function recordAnalyticsEvent(
  session: Session,
  eventType: string,
  details: Record<string, unknown>,
  timestamp: string = new Date().toISOString(),
): Promise<AnalyticsEvent> {
  const event: AnalyticsEvent = {
    id: crypto.randomUUID(),
    event_type: eventType,
    details,
    timestamp,
  };

  await session.executeWrite(async (tx) => {
    await tx.run(
      `CREATE (e:AnalyticsEvent {
        id: $id,
        event_type: $event_type,
        details: $details,
        timestamp: $timestamp
      })`,
      {
        id: event.id,
        event_type: event.event_type,
        details: JSON.stringify(details),
        timestamp: event.timestamp,
      },
    );
  });

  return event;
}

export async function countAnalyticsEventsBefore(
  session: Session,
  cutoff: string,
): Promise<number> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(
      `MATCH (e:AnalyticsEvent)
       WHERE e.timestamp < $cutoff
       RETURN count(e) AS count`,
      { cutoff },
    );
  });
  return toNumber(result.records[0]?.get("count"));
}

export async function deleteAnalyticsEventsBefore(
  session: Session,
  cutoff: string,
  limit: number,
): Promise<number> {
  const result = await session.executeWrite(async (tx) => {
    return tx.run(
      `MATCH (e:AnalyticsEvent)
       WHERE e.timestamp < $cutoff
       WITH e LIMIT $limit
       DELETE e
       RETURN count(*) AS deleted`,
      { cutoff, limit: toInt(limit) },
    );
  });
  return toNumber(result.records[0]?.get("deleted"));
}

export function createNeo4jAnalyticsLog(driver: Driver): AnalyticsLog {
  return {
    record: (eventType, details, timestamp) =>
      withSession(driver, (s) =>
        recordAnalyticsEvent(s, eventType, details, timestamp),
      ),
    countBefore: (cutoff) =>
      withSession(driver, (s) => countAnalyticsEventsBefore(s, cutoff)),
    deleteBefore: (cutoff, limit) =>
      withSession(driver, (s) => deleteAnalyticsEventsBefore(s, cutoff, limit)),
  };
}
