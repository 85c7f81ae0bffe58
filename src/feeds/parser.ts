import Parser from "rss-parser";

export type CustomItem = {
  published?: unknown;
  updated?: unknown;
  created?: unknown;
  mediaThumbnail?: unknown;
  mediaContent?: unknown;
};

export type FeedParser = Parser<Record<string, unknown>, CustomItem>;
export type ParsedFeedItem = CustomItem & Parser.Item;

let parserInstance: FeedParser | null = null;

export function createParser(): FeedParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [
        ["published", "published"],
        ["updated", "updated"],
        ["dc:created", "created"],
        ["media:thumbnail", "mediaThumbnail"],
        ["media:content", "mediaContent"],
      ],
    },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}
