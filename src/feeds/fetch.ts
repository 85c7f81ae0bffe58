export const USER_AGENT = "FeedCourier/1.0 (+rss publisher)";

/**
 * Fetches raw feed XML. Throws on network errors, timeouts and non-2xx
 * responses; the feed reader turns those into an empty result.
 */
export async function fetchFeedXml(
  url: string,
  timeoutMs: number,
): Promise<string> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      "User-Agent": USER_AGENT,
      Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml",
    },
    redirect: "follow",
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }

  return response.text();
}
