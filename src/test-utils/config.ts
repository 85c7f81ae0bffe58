import type { AppConfig } from "../config";

/**
 * Creates a fully populated AppConfig suitable for tests.
 * @param overrides - Optional top-level sections to replace.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    llm: {
      provider: "openai",
      model: "gpt-4o-mini",
      temperature: 0.7,
      maxOutputTokens: 500,
    },
    rewrite: {
      maxLength: 1000,
      maxTries: 3,
      bodyBudget: 400,
      captionBudget: 77,
      footer: "#news",
    },
    sources: [
      {
        name: "decrypt",
        url: "https://decrypt.example/feed",
        dialect: "decrypt",
        articleSelector: "article p",
      },
      {
        name: "beincrypto",
        url: "https://beincrypto.example/feed",
        dialect: "beincrypto",
        articleSelector: "article p",
        footer: "#pressrelease",
      },
    ],
    schedule: [{ source: "decrypt", category: "gaming", time: ["09:00"] }],
    scheduler: {
      jitterSeconds: 0,
      misfireGraceSeconds: 60,
      shutdownGraceSeconds: 5,
    },
    feeds: {
      stalenessHours: 24,
      fetchTimeoutMs: 1000,
    },
    image: {
      width: 800,
      height: 600,
      quality: 85,
    },
    paths: {
      stateFile: "./data/publish-state.json",
      tmpDir: "./tmp",
    },
    delivery: {
      mirrorToServiceChannels: false,
    },
    ...overrides,
  };
}
