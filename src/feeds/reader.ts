// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SourceConfig } from "../config";
import { feedAdapters } from "./adapters";
import type { NewsItem } from "./types";

export type FeedReaderOptions = {
  readonly stalenessHours: number;
  readonly fetchTimeoutMs: number;
  readonly logger: Logger;
  readonly now?: () => Date;
};

/**
 * Returns the freshest entry of `source` tagged `category` and published
 * after `since`, or null.
 *
 * Every failure inside the adapter (HTTP error, timeout, malformed XML) is
 * logged and reported as "no news", so one broken source never affects the
 * jobs of another.
 */
export async function getLatestNews(
  source: Pick<SourceConfig, "name" | "url" | "dialect">,
  category: string,
  since: Date | null,
  options: FeedReaderOptions,
): Promise<NewsItem | null> {
  const { logger } = options;
  const adapter = feedAdapters[source.dialect];

  try {
    const items = await adapter.getLatest({
      source: source.name,
      feedUrl: source.url,
      category,
      since,
      limit: 1,
      now: options.now?.() ?? new Date(),
      stalenessMs: options.stalenessHours * 60 * 60 * 1000,
      fetchTimeoutMs: options.fetchTimeoutMs,
    });

    const latest = items[0] ?? null;
    if (latest) {
      logger.info(
        {
          source: source.name,
          category,
          link: latest.link,
          publishedAt: latest.publishedAt.toISOString(),
        },
        "latest news selected",
      );
    } else {
      logger.info({ source: source.name, category }, "no qualifying feed entries");
    }
    return latest;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(
      { source: source.name, feedUrl: source.url, category, error: message },
      "feed read failed",
    );
    return null;
  }
}
