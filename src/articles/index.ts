export { fetchArticle, fetchArticleText } from "./fetcher";
export { extractArticleText } from "./extractor";
export type { FetchResult, ArticleTextOptions } from "./fetcher";
