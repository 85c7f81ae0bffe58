import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { ProviderName } from "../config";

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
export const DEFAULT_LMSTUDIO_BASE_URL = "http://localhost:1234/v1";

/** Where the self-hosted providers listen. Hosted providers ignore this. */
export type ProviderEndpoints = {
  readonly ollamaBaseUrl?: string;
  readonly lmstudioBaseUrl?: string;
};

/**
 * Resolves a provider name and model id to an AI SDK language model. Hosted
 * providers read their API key from their usual environment variable.
 */
export function getModel(
  provider: ProviderName,
  modelId: string,
  endpoints: ProviderEndpoints = {},
): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return createOllama({
        baseURL: endpoints.ollamaBaseUrl ?? DEFAULT_OLLAMA_BASE_URL,
      })(modelId);
    case "lmstudio":
      return createOpenAICompatible({
        name: "lmstudio",
        baseURL: endpoints.lmstudioBaseUrl ?? DEFAULT_LMSTUDIO_BASE_URL,
      })(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${_exhaustive}`);
    }
  }
}
