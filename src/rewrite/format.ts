// pattern: Functional Core

export type PostParts = {
  readonly title: string;
  readonly body: string;
  readonly footer: string;
};

type Link = { readonly label: string; readonly url: string };

const REFERENCE_DEFINITION = /^[ \t]*\[([^\]]+)\]:[ \t]*(\S+)[ \t]*$/gm;
const HTML_ANCHOR = /<a\s[^>]*?href\s*=\s*["']([^"']+)["'][^>]*>([\s\S]*?)<\/a>/gi;
const INLINE_LINK = /\[([^\]]+)\]\(([^)\s]+)\)/g;
const REFERENCE_LINK = /\[([^\]]+)\]\[([^\]]*)\]/g;
const PLACEHOLDER = /\u0000(\d+)\u0000/g;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function escapeAttribute(text: string): string {
  return escapeHtml(text).replace(/"/g, "&quot;");
}

function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, "");
}

/**
 * Escapes model output for the HTML parse mode and rewrites every link it
 * contains (inline markdown, reference-style markdown, or raw anchors) into
 * one `<a href="...">label</a>` form. Reference definitions are removed.
 */
export function convertLinks(text: string): string {
  const references = new Map<string, string>();
  const links: Array<Link> = [];

  const hold = (label: string, url: string): string => {
    links.push({ label: stripTags(label).trim(), url });
    return `\u0000${links.length - 1}\u0000`;
  };

  const converted = text
    .replace(REFERENCE_DEFINITION, (_match, ref: string, url: string) => {
      references.set(ref.trim().toLowerCase(), url);
      return "";
    })
    .replace(HTML_ANCHOR, (_match, url: string, label: string) => hold(label, url))
    .replace(INLINE_LINK, (_match, label: string, url: string) => hold(label, url))
    .replace(REFERENCE_LINK, (match, label: string, ref: string) => {
      const url = references.get((ref || label).trim().toLowerCase());
      return url ? hold(label, url) : label;
    })
    .replace(/\n{3,}/g, "\n\n")
    .trim();

  return escapeHtml(converted).replace(PLACEHOLDER, (match, index: string) => {
    const link = links[Number(index)];
    return link
      ? `<a href="${escapeAttribute(link.url)}">${escapeHtml(link.label)}</a>`
      : match;
  });
}

/**
 * Strips the decoration models like to put around a one-line caption:
 * markup, surrounding quotes, markdown emphasis, trailing whitespace.
 */
export function cleanCaption(raw: string): string {
  const firstLine = stripTags(raw).trim().split("\n")[0] ?? "";
  return firstLine
    .replace(/\*\*|__/g, "")
    .replace(/^["'“”«»]+|["'“”«»]+$/g, "")
    .trim();
}

/**
 * Assembles the post exactly as it is delivered: bold uppercase title, blank
 * line, body, blank line, footer (omitted when empty).
 */
export function formatPost(parts: PostParts): string {
  const blocks = [
    `<b>${escapeHtml(parts.title.trim().toUpperCase())}</b>`,
    convertLinks(parts.body),
  ];

  const footer = parts.footer.trim();
  if (footer.length > 0) {
    blocks.push(escapeHtml(footer));
  }

  return blocks.join("\n\n");
}

/**
 * Length in characters (code points) of the final formatted text.
 */
export function measureLength(text: string): number {
  return Array.from(text).length;
}
