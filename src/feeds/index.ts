export { getLatestNews } from "./reader";
export { feedAdapters } from "./adapters";
export { selectLatest } from "./select";
export { parseFeedDate, resolvePublishedAt } from "./dates";
export type { FeedReaderOptions } from "./reader";
export type { NewsItem, FeedEntry, FeedAdapter, LatestNewsRequest } from "./types";
