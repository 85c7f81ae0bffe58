// pattern: Imperative Shell
import { resolve } from "node:path";
import type { Logger } from "pino";
import { fetchArticleText } from "./articles";
import { formatTimeOfDay, resolveSchedule } from "./config";
import type { AppConfig, Secrets, TimeOfDay } from "./config";
import { createTelegramPoster } from "./delivery";
import type { TelegramPoster } from "./delivery";
import { feedAdapters, getLatestNews } from "./feeds";
import { createImagePreparer } from "./images";
import { createLlmClient } from "./llm";
import { createPublishPipeline } from "./pipeline";
import type { PublishPipeline } from "./pipeline";
import { createRewriteEngine } from "./rewrite";
import type { TextGenerator } from "./rewrite";
import { createPublishScheduler } from "./scheduler";
import type { JobEvent, PublishScheduler } from "./scheduler";
import { createPublishStateStore } from "./state";

export type ServiceDeps = {
  readonly config: AppConfig;
  readonly secrets: Secrets;
  readonly logger: Logger;
  /** Defaults to the configured language model. */
  readonly generator?: TextGenerator;
  readonly poster?: TelegramPoster;
  readonly random?: () => number;
  readonly now?: () => Date;
};

export type Service = {
  readonly scheduler: PublishScheduler;
  readonly pipeline: PublishPipeline;
  /** Arms one job per resolved (source, category, time). Returns the job count. */
  readonly registerJobs: () => number;
  /** Starts the triggers and sends the job table to the service channels. */
  readonly start: () => Promise<void>;
};

export function jobIdFor(source: string, category: string, time: TimeOfDay): string {
  return `${source}:${category}:${formatTimeOfDay(time)}`;
}

function describeJobEvent(event: JobEvent): string | null {
  switch (event.type) {
    case "missed":
      return `[${event.jobId}] missed run scheduled for ${event.scheduledFor.toISOString()} (${Math.round(event.lateByMs / 1000)}s late)`;
    case "failed":
      return `[${event.jobId}] job error: ${event.error}`;
    case "cancelled":
      return `[${event.jobId}] run cancelled by shutdown before it started`;
    case "succeeded":
      return null;
  }
}

/**
 * Wires configuration, secrets and every component into a runnable service.
 */
export function createService(deps: ServiceDeps): Service {
  const { config, secrets, logger } = deps;

  const poster =
    deps.poster ??
    createTelegramPoster({
      token: secrets.telegramBotToken,
      targetChannels: secrets.targetChannels,
      serviceChannels: secrets.serviceChannels,
      mirrorToServiceChannels: config.delivery.mirrorToServiceChannels,
      timeoutMs: config.feeds.fetchTimeoutMs,
      logger,
    });

  const rewriteEngine = createRewriteEngine({
    generator: deps.generator ?? createLlmClient(config),
    maxLength: config.rewrite.maxLength,
    maxTries: config.rewrite.maxTries,
    footer: config.rewrite.footer,
    logger,
  });

  const pipeline = createPublishPipeline({
    sources: config.sources,
    readLatest: (source, category, since) =>
      getLatestNews(source, category, since, {
        stalenessHours: config.feeds.stalenessHours,
        fetchTimeoutMs: config.feeds.fetchTimeoutMs,
        logger,
        now: deps.now,
      }),
    fetchArticleText: (item, source) =>
      fetchArticleText(item.link, {
        selector: source.articleSelector,
        timeoutMs: config.feeds.fetchTimeoutMs,
        clean: feedAdapters[source.dialect].cleanArticleText,
        logger,
      }),
    stateStore: createPublishStateStore(resolve(config.paths.stateFile), logger),
    rewriteEngine,
    prepareImage: createImagePreparer({
      tmpDir: resolve(config.paths.tmpDir),
      timeoutMs: config.feeds.fetchTimeoutMs,
      size: config.image,
      logger,
    }),
    publishNews: (text, imagePath) => poster.publishNews(text, imagePath),
    sendReport: (text) => poster.sendServiceReport(text),
    logger,
  });

  const scheduler = createPublishScheduler({
    logger,
    jitterMs: config.scheduler.jitterSeconds * 1000,
    misfireGraceMs: config.scheduler.misfireGraceSeconds * 1000,
    random: deps.random,
    now: deps.now,
    onJobEvent: async (event) => {
      const report = describeJobEvent(event);
      if (report) await poster.sendServiceReport(report);
    },
  });

  return {
    scheduler,
    pipeline,

    registerJobs: () => {
      const entries = resolveSchedule(
        config.schedule,
        new Set(config.sources.map((s) => s.name)),
        logger,
      );

      let count = 0;
      for (const entry of entries) {
        for (const time of entry.times) {
          scheduler.schedule(jobIdFor(entry.source, entry.category, time), time, (signal) =>
            pipeline.runJob(entry.source, entry.category, signal),
          );
          count += 1;
        }
      }

      logger.info({ jobCount: count }, "schedule registered");
      return count;
    },

    start: async () => {
      scheduler.start();
      await poster.sendServiceReport(scheduler.describeJobs());
    },
  };
}
