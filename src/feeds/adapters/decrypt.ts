import { resolvePublishedAt } from "../dates";
import { attributeUrl, createRssAdapter, normalizeCategories } from "./rss";

const SUMMARY_LENGTH = 200;

function truncate(text: string, length: number): string {
  const chars = Array.from(text);
  return chars.length > length ? `${chars.slice(0, length).join("")}...` : text;
}

/**
 * Feeds that tag entries with topic categories and attach a
 * `media:thumbnail`. Article pages end with an editor credit that is cut off.
 */
export const decryptAdapter = createRssAdapter({
  dialect: "decrypt",
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
    summary: truncate(item.contentSnippet?.trim() ?? "", SUMMARY_LENGTH),
    imageLink: attributeUrl(item.mediaThumbnail),
  }),
  cleanArticleText: (text) => (text.split("Edited by")[0] ?? "").trim(),
});
