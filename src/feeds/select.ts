// pattern: Functional Core
import type { FeedEntry, LatestNewsQuery } from "./types";

/**
 * Filters parsed entries down to publication candidates, newest first.
 *
 * An entry survives when it is no older than the staleness window, carries
 * the target category, and was published strictly after `since`. Entries
 * with equal timestamps keep their feed order.
 */
export function selectLatest(
  entries: ReadonlyArray<FeedEntry>,
  query: LatestNewsQuery,
): Array<FeedEntry> {
  const threshold = query.now.getTime() - query.stalenessMs;
  const category = query.category.trim().toLowerCase();
  const since = query.since?.getTime() ?? null;

  return entries
    .filter((entry) => entry.publishedAt.getTime() >= threshold)
    .filter((entry) => entry.categories.includes(category))
    .filter((entry) => since === null || entry.publishedAt.getTime() > since)
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
    .slice(0, query.limit);
}
