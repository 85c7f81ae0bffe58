// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SourceConfig } from "../config";
import type { DeliveryResult } from "../delivery";
import type { NewsItem } from "../feeds";
import type { ImagePreparer, PreparedImage } from "../images";
import { RewriteTooLongError } from "../rewrite";
import type { RewriteEngine, RewriteResult } from "../rewrite";
import { getWatermark } from "../state";
import type { PublishStateStore } from "../state";
import { buildJobReport } from "./report";
import type { JobOutcome } from "./types";

export type PublishPipelineDeps = {
  readonly sources: ReadonlyArray<SourceConfig>;
  readonly readLatest: (
    source: SourceConfig,
    category: string,
    since: Date | null,
  ) => Promise<NewsItem | null>;
  readonly fetchArticleText: (
    item: NewsItem,
    source: SourceConfig,
  ) => Promise<string | null>;
  readonly stateStore: Pick<PublishStateStore, "load" | "update">;
  readonly rewriteEngine: RewriteEngine;
  readonly prepareImage: ImagePreparer;
  readonly publishNews: (text: string, imagePath: string | null) => Promise<DeliveryResult>;
  readonly sendReport: (text: string) => Promise<void>;
  readonly logger: Logger;
};

export type PublishPipeline = {
  /**
   * Publishes the freshest unpublished item of (source, category). Never
   * throws: every outcome is logged, reported once and returned.
   */
  runJob(source: string, category: string, signal?: AbortSignal): Promise<JobOutcome>;
};

/**
 * Text handed to the rewrite engine: the article body when it can be
 * extracted, else the feed summary, else the title.
 */
function pickSourceText(item: NewsItem, articleText: string | null): string {
  if (articleText && articleText.trim().length > 0) return articleText;
  if (item.summary.trim().length > 0) return item.summary;
  return item.title;
}

/**
 * Creates the pipeline that turns one trigger into at most one published post.
 * Runs each job as: load watermark → read feed → fetch article → rewrite → prepare image → deliver → advance watermark.
 *
 * @param deps - Configured sources and the feed reader, article fetcher, state store, rewrite engine, image preparer and Telegram delivery functions
 * @returns A PublishPipeline whose runJob() resolves to the job's outcome after its report is sent
 */
export function createPublishPipeline(deps: PublishPipelineDeps): PublishPipeline {
  const sourcesByName = new Map(deps.sources.map((s) => [s.name, s]));

  async function execute(
    sourceName: string,
    category: string,
    signal: AbortSignal | undefined,
    logger: Logger,
  ): Promise<JobOutcome> {
    const key = { source: sourceName, category };
    const source = sourcesByName.get(sourceName);
    if (!source) {
      return { ...key, status: "failed", error: `unknown source "${sourceName}"` };
    }
    if (signal?.aborted) {
      return { ...key, status: "cancelled", item: null };
    }

    const state = await deps.stateStore.load();
    const since = getWatermark(state, sourceName, category);

    const item = await deps.readLatest(source, category, since);
    if (!item) {
      return { ...key, status: "no_news", since };
    }
    logger.info({ title: item.title, link: item.link }, "publishing news item");

    if (signal?.aborted) {
      return { ...key, status: "cancelled", item };
    }

    const articleText = await deps.fetchArticleText(item, source);
    const sourceText = pickSourceText(item, articleText);

    let rewritten: RewriteResult;
    try {
      rewritten = await deps.rewriteEngine.rewrite(
        sourceText,
        item.title,
        source.footer !== undefined ? { footer: source.footer } : undefined,
      );
    } catch (err) {
      if (err instanceof RewriteTooLongError) {
        return {
          ...key,
          status: "rewrite_too_long",
          item,
          rewrittenNews: err.rewrittenNews,
          rewrittenLength: err.rewrittenLength,
          maxLength: err.maxLength,
          attempts: err.attempts,
        };
      }
      throw err;
    }

    const image: PreparedImage | null = item.imageLink
      ? await deps.prepareImage(item.imageLink)
      : null;

    let delivery: DeliveryResult;
    try {
      delivery = await deps.publishNews(rewritten.text, image?.path ?? null);
    } finally {
      await image?.cleanup();
    }

    if (!delivery.success) {
      return {
        ...key,
        status: "delivery_failed",
        item,
        delivered: delivery.delivered,
        failed: delivery.failed,
      };
    }

    await deps.stateStore.update(sourceName, category, item.publishedAt);

    return {
      ...key,
      status: "published",
      item,
      length: rewritten.length,
      attempts: rewritten.attempts,
      withImage: image !== null,
      delivered: delivery.delivered,
    };
  }

  function logOutcome(outcome: JobOutcome, logger: Logger): void {
    switch (outcome.status) {
      case "published":
        logger.info(
          { link: outcome.item.link, length: outcome.length, attempts: outcome.attempts },
          "news published",
        );
        return;
      case "no_news":
        logger.info({ since: outcome.since?.toISOString() ?? null }, "no fresh news");
        return;
      case "cancelled":
        logger.info("job cancelled by shutdown");
        return;
      case "rewrite_too_long":
        logger.warn(
          { link: outcome.item.link, length: outcome.rewrittenLength, maxLength: outcome.maxLength },
          "rewrite exceeded length limit, item skipped",
        );
        return;
      case "delivery_failed":
        logger.error({ link: outcome.item.link, failed: outcome.failed }, "news delivery failed");
        return;
      case "failed":
        logger.error({ error: outcome.error }, "publish job failed");
        return;
    }
  }

  return {
    async runJob(sourceName, category, signal) {
      const logger = deps.logger.child({ source: sourceName, category });

      let outcome: JobOutcome;
      try {
        outcome = await execute(sourceName, category, signal, logger);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        outcome = { source: sourceName, category, status: "failed", error: message };
      }

      logOutcome(outcome, logger);
      await deps.sendReport(buildJobReport(outcome));
      return outcome;
    },
  };
}
