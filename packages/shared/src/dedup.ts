import type { ArticleStore } from "./types.js";

/**
 * Returns the candidates that are not yet stored, using one batched lookup.
 * Advisory only: a link can still be inserted by another path before the
 * crawl worker writes it, and the store's uniqueness constraint decides.
 */
export async function filterNew(
  store: Pick<ArticleStore, "findExistingLinks">,
  urls: Iterable<string>,
): Promise<Set<string>> {
  const candidates = new Set(urls);
  if (candidates.size === 0) return candidates;

  const existing = await store.findExistingLinks(candidates);
  for (const link of existing) candidates.delete(link);
  return candidates;
}
