import { describe, it, expect, beforeEach, vi } from "vitest";
import pino from "pino";
import type { NewsItem } from "../feeds";
import type { DeliveryResult } from "../delivery";
import type { PreparedImage } from "../images";
import { RewriteTooLongError } from "../rewrite";
import type { RewriteResult } from "../rewrite";
import type { PublishState } from "../state";
import { createTestConfig } from "../test-utils/config";
import { createPublishPipeline } from "./pipeline";
import type { PublishPipelineDeps } from "./pipeline";

const item: NewsItem = {
  title: "Studio ships on-chain racing game",
  link: "https://decrypt.example/racing",
  publishedAt: new Date("2026-10-19T10:00:00Z"),
  source: "decrypt",
  category: "gaming",
  summary: "A short feed summary.",
  imageLink: null,
};

const rewriteResult: RewriteResult = {
  text: "<b>RACING</b>\n\nBody\n\n#news",
  length: 27,
  attempts: 1,
};

describe("createPublishPipeline", () => {
  const config = createTestConfig();
  let state: PublishState;
  let readLatest: ReturnType<typeof vi.fn>;
  let fetchArticleText: ReturnType<typeof vi.fn>;
  let update: ReturnType<typeof vi.fn>;
  let rewrite: ReturnType<typeof vi.fn>;
  let prepareImage: ReturnType<typeof vi.fn>;
  let publishNews: ReturnType<typeof vi.fn>;
  let sendReport: ReturnType<typeof vi.fn>;
  let deps: PublishPipelineDeps;

  beforeEach(() => {
    state = {};
    readLatest = vi.fn().mockResolvedValue(item);
    fetchArticleText = vi.fn().mockResolvedValue("Full article text.");
    update = vi.fn().mockResolvedValue(undefined);
    rewrite = vi.fn().mockResolvedValue(rewriteResult);
    prepareImage = vi.fn().mockResolvedValue(null);
    publishNews = vi.fn().mockResolvedValue({
      success: true,
      delivered: ["@news"],
    } satisfies DeliveryResult);
    sendReport = vi.fn().mockResolvedValue(undefined);

    deps = {
      sources: config.sources,
      readLatest,
      fetchArticleText,
      stateStore: { load: async () => state, update },
      rewriteEngine: { rewrite },
      prepareImage,
      publishNews,
      sendReport,
      logger: pino({ level: "silent" }),
    };
  });

  it("should publish the item, advance the watermark and report once", async () => {
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming");

    expect(outcome.status).toBe("published");
    expect(rewrite).toHaveBeenCalledWith("Full article text.", item.title, undefined);
    expect(publishNews).toHaveBeenCalledWith(rewriteResult.text, null);
    expect(update).toHaveBeenCalledWith("decrypt", "gaming", item.publishedAt);
    expect(sendReport).toHaveBeenCalledTimes(1);
    expect(sendReport).toHaveBeenCalledWith(
      [
        "[decrypt/gaming] published: Studio ships on-chain racing game",
        "https://decrypt.example/racing",
        "length 27, attempts 1, text only",
        "channels: @news",
      ].join("\n"),
    );
  });

  it("should read with the stored watermark as since", async () => {
    state = { decrypt: { gaming: "2026-10-19T08:00:00.000Z" } };
    const pipeline = createPublishPipeline(deps);

    await pipeline.runJob("decrypt", "gaming");

    const [source, category, since] = readLatest.mock.calls[0] ?? [];
    expect(source.name).toBe("decrypt");
    expect(category).toBe("gaming");
    expect(since).toEqual(new Date("2026-10-19T08:00:00.000Z"));
  });

  it("should emit exactly one no-news report and leave state unchanged", async () => {
    readLatest.mockResolvedValue(null);
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming");

    expect(outcome).toEqual({
      source: "decrypt",
      category: "gaming",
      status: "no_news",
      since: null,
    });
    expect(sendReport).toHaveBeenCalledTimes(1);
    expect(sendReport).toHaveBeenCalledWith("[decrypt/gaming] no fresh news");
    expect(update).not.toHaveBeenCalled();
    expect(rewrite).not.toHaveBeenCalled();
    expect(publishNews).not.toHaveBeenCalled();
  });

  it("should pass the source's own footer to the rewrite engine", async () => {
    readLatest.mockResolvedValue({ ...item, source: "beincrypto", category: "news" });
    const pipeline = createPublishPipeline(deps);

    await pipeline.runJob("beincrypto", "news");

    expect(rewrite).toHaveBeenCalledWith("Full article text.", item.title, {
      footer: "#pressrelease",
    });
  });

  it("should fall back to the feed summary when the article text is unavailable", async () => {
    fetchArticleText.mockResolvedValue(null);
    const pipeline = createPublishPipeline(deps);

    await pipeline.runJob("decrypt", "gaming");

    expect(rewrite).toHaveBeenCalledWith("A short feed summary.", item.title, undefined);
  });

  it("should report the offending text when the rewrite never fits", async () => {
    rewrite.mockRejectedValue(
      new RewriteTooLongError({
        originalNews: "Full article text.",
        rewrittenNews: "<b>WAY TOO LONG</b>",
        rewrittenLength: 1200,
        maxLength: 1000,
        attempts: 3,
      }),
    );
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming");

    expect(outcome.status).toBe("rewrite_too_long");
    expect(publishNews).not.toHaveBeenCalled();
    expect(update).not.toHaveBeenCalled();
    expect(sendReport).toHaveBeenCalledTimes(1);
    expect(sendReport).toHaveBeenCalledWith(
      [
        "[decrypt/gaming] rewrite too long: 1200 characters after 3 attempts (limit 1000)",
        "https://decrypt.example/racing",
        "",
        "Last attempt:",
        "<b>WAY TOO LONG</b>",
      ].join("\n"),
    );
  });

  it("should not advance the watermark when delivery fails", async () => {
    publishNews.mockResolvedValue({
      success: false,
      delivered: [],
      failed: [{ channel: "@news", error: "Forbidden: bot was kicked" }],
    } satisfies DeliveryResult);
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming");

    expect(outcome.status).toBe("delivery_failed");
    expect(update).not.toHaveBeenCalled();
    expect(sendReport).toHaveBeenCalledTimes(1);
    expect(sendReport).toHaveBeenCalledWith(
      [
        "[decrypt/gaming] delivery failed: Studio ships on-chain racing game",
        "https://decrypt.example/racing",
        "- @news: Forbidden: bot was kicked",
        "delivered to: none",
      ].join("\n"),
    );
  });

  describe("with an image link", () => {
    const withImage = { ...item, imageLink: "https://cdn.example/cover.png" };

    it("should deliver the prepared image and clean it up", async () => {
      const cleanup = vi.fn().mockResolvedValue(undefined);
      const prepared: PreparedImage = { path: "/tmp/image-1/prepared.jpg", cleanup };
      readLatest.mockResolvedValue(withImage);
      prepareImage.mockResolvedValue(prepared);
      const pipeline = createPublishPipeline(deps);

      const outcome = await pipeline.runJob("decrypt", "gaming");

      expect(prepareImage).toHaveBeenCalledWith("https://cdn.example/cover.png");
      expect(publishNews).toHaveBeenCalledWith(rewriteResult.text, "/tmp/image-1/prepared.jpg");
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(outcome.status === "published" && outcome.withImage).toBe(true);
    });

    it("should deliver text only when the image cannot be prepared", async () => {
      readLatest.mockResolvedValue(withImage);
      const pipeline = createPublishPipeline(deps);

      const outcome = await pipeline.runJob("decrypt", "gaming");

      expect(publishNews).toHaveBeenCalledWith(rewriteResult.text, null);
      expect(outcome.status === "published" && outcome.withImage).toBe(false);
    });

    it("should clean up the image even when delivery throws", async () => {
      const cleanup = vi.fn().mockResolvedValue(undefined);
      readLatest.mockResolvedValue(withImage);
      prepareImage.mockResolvedValue({ path: "/tmp/image-1/prepared.jpg", cleanup });
      publishNews.mockRejectedValue(new Error("EACCES: permission denied"));
      const pipeline = createPublishPipeline(deps);

      const outcome = await pipeline.runJob("decrypt", "gaming");

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(outcome).toEqual({
        source: "decrypt",
        category: "gaming",
        status: "failed",
        error: "EACCES: permission denied",
      });
    });
  });

  it("should not read the feed when the job is aborted before it starts", async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming", controller.signal);

    expect(outcome).toEqual({
      source: "decrypt",
      category: "gaming",
      status: "cancelled",
      item: null,
    });
    expect(readLatest).not.toHaveBeenCalled();
    expect(sendReport).toHaveBeenCalledWith("[decrypt/gaming] cancelled by shutdown");
  });

  it("should stop before rewriting when shutdown starts during the feed read", async () => {
    const controller = new AbortController();
    readLatest.mockImplementation(async () => {
      controller.abort();
      return item;
    });
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming", controller.signal);

    expect(outcome.status).toBe("cancelled");
    expect(rewrite).not.toHaveBeenCalled();
    expect(sendReport).toHaveBeenCalledWith(
      "[decrypt/gaming] cancelled by shutdown before rewriting: Studio ships on-chain racing game",
    );
  });

  it("should catch unexpected errors at the job boundary and report them", async () => {
    rewrite.mockRejectedValue(new Error("provider returned 500"));
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("decrypt", "gaming");

    expect(outcome).toEqual({
      source: "decrypt",
      category: "gaming",
      status: "failed",
      error: "provider returned 500",
    });
    expect(update).not.toHaveBeenCalled();
    expect(sendReport).toHaveBeenCalledTimes(1);
    expect(sendReport).toHaveBeenCalledWith("[decrypt/gaming] job failed: provider returned 500");
  });

  it("should report a job for a source that is not configured", async () => {
    const pipeline = createPublishPipeline(deps);

    const outcome = await pipeline.runJob("cointelegraph", "news");

    expect(outcome).toEqual({
      source: "cointelegraph",
      category: "news",
      status: "failed",
      error: 'unknown source "cointelegraph"',
    });
    expect(readLatest).not.toHaveBeenCalled();
  });
});
