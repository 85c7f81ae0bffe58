// pattern: Functional Core
import * as cheerio from "cheerio";

/**
 * Extracts readable article text from a page: the trimmed text of every
 * element matching `selector`, blank matches dropped, joined by blank lines.
 */
export function extractArticleText(html: string, selector: string): string {
  const $ = cheerio.load(html);

  return $(selector)
    .map((_, el) => $(el).text().replace(/\s+/g, " ").trim())
    .get()
    .filter((text) => text.length > 0)
    .join("\n\n");
}
