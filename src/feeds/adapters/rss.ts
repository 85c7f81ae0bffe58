import type { FeedDialect } from "../../config";
import { fetchFeedXml } from "../fetch";
import { getParserInstance } from "../parser";
import type { ParsedFeedItem } from "../parser";
import { selectLatest } from "../select";
import type { FeedAdapter, FeedEntry, LatestNewsRequest, NewsItem } from "../types";

export type RssAdapterDefinition = {
  readonly dialect: FeedDialect;
  readonly toEntry: (item: ParsedFeedItem, now: Date) => FeedEntry;
  readonly cleanArticleText?: (text: string) => string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalises `<category>` values to lowercase terms. rss-parser yields plain
 * strings, `{ _: text }` when the element has attributes, and `{ $: { term } }`
 * for Atom.
 */
export function normalizeCategories(raw: unknown): Array<string> {
  if (!Array.isArray(raw)) return [];

  const terms: Array<string> = [];
  for (const value of raw) {
    let term: unknown = value;
    if (isRecord(value)) {
      const attributes = value["$"];
      term = value["_"] ?? (isRecord(attributes) ? attributes["term"] : undefined);
    }
    if (typeof term === "string" && term.trim().length > 0) {
      terms.push(term.trim().toLowerCase());
    }
  }
  return terms;
}

/**
 * Reads the `url` attribute of a media element such as
 * `<media:thumbnail url="..."/>`.
 */
export function attributeUrl(raw: unknown): string | null {
  const element = Array.isArray(raw) ? raw[0] : raw;
  if (!isRecord(element)) return null;

  const attributes = element["$"];
  if (!isRecord(attributes)) return null;

  const url = attributes["url"];
  return typeof url === "string" && url.length > 0 ? url : null;
}

export function createRssAdapter(definition: RssAdapterDefinition): FeedAdapter {
  return {
    dialect: definition.dialect,
    cleanArticleText: definition.cleanArticleText ?? ((text) => text.trim()),
    getLatest: async (request: LatestNewsRequest): Promise<Array<NewsItem>> => {
      const xml = await fetchFeedXml(request.feedUrl, request.fetchTimeoutMs);
      const feed = await getParserInstance().parseString(xml);

      const entries = feed.items
        .map((item) => definition.toEntry(item, request.now))
        .filter((entry) => entry.link.length > 0);

      const category = request.category.trim().toLowerCase();

      return selectLatest(entries, request).map((entry) => ({
        title: entry.title,
        link: entry.link,
        publishedAt: entry.publishedAt,
        source: request.source,
        category,
        summary: entry.summary,
        imageLink: entry.imageLink,
      }));
    },
  };
}
