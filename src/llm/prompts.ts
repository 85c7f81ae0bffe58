// pattern: Functional Core

export function rewriteSystemPrompt(budget: number): string {
  return `You rewrite news articles into short posts for a Telegram news channel. STRICT OUTPUT LIMIT: ${budget} characters.`;
}

export function buildRewritePrompt(sourceText: string, budget: number): string {
  return `Rewrite the article below as a Telegram channel post.

Hard limit: ${budget} characters. Going over the limit fails the task.

Style:
- Open with one emoji that fits the story
- Short sentences and short paragraphs
- Keep the facts, names and numbers of the original
- One engaging question or call to action at the end
- Links, if any, as markdown: [label](url)
- No title line and no hashtags; both are added separately

Article:
${sourceText}`;
}

export function captionSystemPrompt(budget: number): string {
  return `You write one-line captions for news posts. STRICT OUTPUT LIMIT: ${budget} characters.`;
}

export function buildCaptionPrompt(sourceText: string, budget: number): string {
  return `Write a caption for the text below.

Hard limit: ${budget} characters, one short sentence, no quotes, no emoji.

Text:
${sourceText}`;
}
