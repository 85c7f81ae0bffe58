import type { Logger } from "pino";
import { USER_AGENT } from "../feeds/fetch";
import { extractArticleText } from "./extractor";

export type FetchResult =
  | { readonly success: true; readonly html: string; readonly url: string }
  | { readonly success: false; readonly error: string; readonly url: string };

export type ArticleTextOptions = {
  readonly selector: string;
  readonly timeoutMs: number;
  readonly clean?: (text: string) => string;
  readonly logger: Logger;
};

/**
 * Fetches article HTML from a single URL with a timeout.
 */
export async function fetchArticle(
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (!response.ok) {
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const html = await response.text();
    return { success: true, html, url };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url, error: message }, "article fetch failed");
    return { success: false, error: message, url };
  }
}

/**
 * Full text of the article behind `url`, or null when the page cannot be
 * fetched or the selector finds nothing.
 */
export async function fetchArticleText(
  url: string,
  options: ArticleTextOptions,
): Promise<string | null> {
  const { logger } = options;
  const result = await fetchArticle(url, options.timeoutMs, logger);

  if (!result.success) {
    logger.warn({ url, error: result.error }, "article text unavailable");
    return null;
  }

  const raw = extractArticleText(result.html, options.selector);
  const text = options.clean ? options.clean(raw) : raw.trim();

  if (text.length === 0) {
    logger.warn({ url, selector: options.selector }, "article selector matched no text");
    return null;
  }

  logger.debug({ url, length: text.length }, "article text extracted");
  return text;
}
