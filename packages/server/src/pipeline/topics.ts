import type { SubscriberDirectory } from "@topicwire/shared";

/** Set union of every subscriber's topics; blanks dropped, case kept. */
export function mergeTopics(lists: Iterable<readonly string[]>): Set<string> {
  const topics = new Set<string>();
  for (const list of lists) {
    for (const raw of list) {
      const topic = raw.trim();
      if (topic) topics.add(topic);
    }
  }
  return topics;
}

export async function aggregateTopics(
  directory: SubscriberDirectory,
): Promise<Set<string>> {
  return mergeTopics(await directory.listTopicLists());
}
