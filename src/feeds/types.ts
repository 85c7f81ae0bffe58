import type { FeedDialect } from "../config";

/**
 * A feed entry chosen for publication. `publishedAt` is an absolute instant;
 * `category` is always lowercase.
 */
export type NewsItem = {
  readonly title: string;
  readonly link: string;
  readonly publishedAt: Date;
  readonly source: string;
  readonly category: string;
  readonly summary: string;
  readonly imageLink: string | null;
};

/**
 * A feed entry after dialect-specific parsing, before filtering.
 */
export type FeedEntry = {
  readonly title: string;
  readonly link: string;
  readonly publishedAt: Date;
  readonly categories: ReadonlyArray<string>;
  readonly summary: string;
  readonly imageLink: string | null;
};

export type LatestNewsQuery = {
  readonly category: string;
  readonly since: Date | null;
  readonly now: Date;
  readonly stalenessMs: number;
  readonly limit: number;
};

export type LatestNewsRequest = LatestNewsQuery & {
  readonly source: string;
  readonly feedUrl: string;
  readonly fetchTimeoutMs: number;
};

/**
 * One news source dialect. Adapters are looked up by dialect rather than
 * subclassed, so adding a source is a new entry in the adapter table.
 */
export type FeedAdapter = {
  readonly dialect: FeedDialect;
  readonly getLatest: (
    request: LatestNewsRequest,
  ) => Promise<ReadonlyArray<NewsItem>>;
  readonly cleanArticleText: (text: string) => string;
};
