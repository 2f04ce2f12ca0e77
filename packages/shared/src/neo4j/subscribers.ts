// =============================================================================
// @topicwire/shared: Subscriber topic lookup
// =============================================================================
// Reads every :User node projecting only its topics list. Users without a
// topics property contribute an empty list.
// =============================================================================

import { withSession, type Driver, type Session } from "./driver.js";
import type { SubscriberDirectory } from "../types.js";

export async function listSubscriberTopics(
  session: Session,
): Promise<string[][]> {
  const result = await session.executeRead(async (tx) => {
    return tx.run(`MATCH (u:User) RETURN coalesce(u.topics, []) AS topics`);
  });

  return result.records.map((record) => {
    const topics: unknown = record.get("topics");
    return Array.isArray(topics)
      ? topics.filter((t): t is string => typeof t === "string")
      : [];
  });
}

export function createNeo4jSubscriberDirectory(
  driver: Driver,
): SubscriberDirectory {
  return {
    listTopicLists: () => withSession(driver, listSubscriberTopics),
  };
}
