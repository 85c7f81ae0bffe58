import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Logger } from "pino";
import { fetchArticle, fetchArticleText } from "./fetcher";

describe("fetchArticle", () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = { warn: vi.fn(), debug: vi.fn() } as unknown as Logger;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should return the page html on success", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<p>Hi</p>")));

    const result = await fetchArticle("https://news.example/a", 1000, mockLogger);

    expect(result).toEqual({ success: true, html: "<p>Hi</p>", url: "https://news.example/a" });
  });

  it("should report HTTP errors without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 404, statusText: "Not Found" })),
    );

    const result = await fetchArticle("https://news.example/missing", 1000, mockLogger);

    expect(result).toEqual({
      success: false,
      error: "HTTP 404: Not Found",
      url: "https://news.example/missing",
    });
  });

  it("should report network errors and log them", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("socket hang up")));

    const result = await fetchArticle("https://news.example/a", 1000, mockLogger);

    expect(result).toEqual({
      success: false,
      error: "socket hang up",
      url: "https://news.example/a",
    });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { url: "https://news.example/a", error: "socket hang up" },
      "article fetch failed",
    );
  });
});

describe("fetchArticleText", () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = { warn: vi.fn(), debug: vi.fn() } as unknown as Logger;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should extract and clean the article body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response(
            "<article><p>Story text.</p><p>Edited by An Editor</p></article>",
          ),
      ),
    );

    const text = await fetchArticleText("https://news.example/a", {
      selector: "article p",
      timeoutMs: 1000,
      clean: (raw) => (raw.split("Edited by")[0] ?? "").trim(),
      logger: mockLogger,
    });

    expect(text).toBe("Story text.");
  });

  it("should return null when the selector matches nothing", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<div>nothing</div>")));

    const text = await fetchArticleText("https://news.example/a", {
      selector: "article p",
      timeoutMs: 1000,
      logger: mockLogger,
    });

    expect(text).toBeNull();
  });

  it("should return null when the page cannot be fetched", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 500, statusText: "Server Error" })),
    );

    const text = await fetchArticleText("https://news.example/a", {
      selector: "article p",
      timeoutMs: 1000,
      logger: mockLogger,
    });

    expect(text).toBeNull();
  });
});
