// pattern: Imperative Shell
import type { Logger } from "pino";
import { RewriteTooLongError } from "./errors";
import { cleanCaption, formatPost, measureLength } from "./format";

/**
 * The text-generation backend as the engine sees it.
 */
export type TextGenerator = {
  readonly rewrite: (text: string) => Promise<string>;
  readonly summarize: (text: string) => Promise<string>;
};

export type RewriteResult = {
  readonly text: string;
  readonly length: number;
  readonly attempts: number;
};

export type RewriteEngineOptions = {
  readonly generator: TextGenerator;
  readonly maxLength: number;
  readonly maxTries: number;
  readonly footer: string;
  readonly logger: Logger;
};

export type RewriteEngine = {
  readonly rewrite: (
    source: string,
    titleHint?: string | null,
    overrides?: { readonly footer?: string },
  ) => Promise<RewriteResult>;
};

/**
 * Creates the bounded rewrite loop.
 *
 * Each attempt asks the generator for a fresh body and caption, assembles
 * the post and measures the assembled text. The first attempt within
 * `maxLength` wins; after `maxTries` misses a {@link RewriteTooLongError}
 * is thrown with the last attempt. Generator errors propagate unchanged.
 */
export function createRewriteEngine(options: RewriteEngineOptions): RewriteEngine {
  const { generator, maxLength, maxTries, logger } = options;

  if (maxTries < 1) {
    throw new Error(`maxTries must be at least 1, got ${maxTries}`);
  }

  return {
    rewrite: async (source, titleHint, overrides) => {
      const footer = overrides?.footer ?? options.footer;
      let lastText = "";
      let lastLength = 0;

      for (let attempt = 1; attempt <= maxTries; attempt++) {
        const body = (await generator.rewrite(source)).trim();
        const caption = cleanCaption(
          await generator.summarize(titleHint?.trim() || body),
        );

        const text = formatPost({ title: caption, body, footer });
        const length = measureLength(text);

        if (length <= maxLength) {
          logger.info({ attempt, length, maxLength }, "news rewritten");
          return { text, length, attempts: attempt };
        }

        logger.warn(
          { attempt, maxTries, length, maxLength },
          "rewritten news exceeds length limit",
        );
        lastText = text;
        lastLength = length;
      }

      throw new RewriteTooLongError({
        originalNews: source,
        rewrittenNews: lastText,
        rewrittenLength: lastLength,
        maxLength,
        attempts: maxTries,
      });
    },
  };
}
