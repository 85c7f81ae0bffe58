import { resolvePublishedAt } from "../dates";
import type { ParsedFeedItem } from "../parser";
import { attributeUrl, createRssAdapter, normalizeCategories } from "./rss";

function enclosureImage(item: ParsedFeedItem): string | null {
  const enclosure = item.enclosure;
  if (!enclosure?.url) return null;
  return enclosure.type?.startsWith("image/") ? enclosure.url : null;
}

/**
 * Press-release style feeds: images come as `media:content`, falling back to
 * `media:thumbnail` and then an image enclosure. The full description is kept
 * as the summary.
 */
export const beincryptoAdapter = createRssAdapter({
  dialect: "beincrypto",
  toEntry: (item, now) => ({
    title: item.title?.trim() ?? "",
    link: item.link?.trim() ?? "",
    publishedAt: resolvePublishedAt(
      {
        published: item.pubDate ?? item.published,
        updated: item.updated,
        created: item.created,
      },
      now,
    ),
    categories: normalizeCategories(item.categories),
    summary: item.contentSnippet?.trim() ?? "",
    imageLink:
      attributeUrl(item.mediaContent) ??
      attributeUrl(item.mediaThumbnail) ??
      enclosureImage(item),
  }),
});
