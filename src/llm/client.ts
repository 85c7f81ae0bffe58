import type { AppConfig } from "../config";
import type { TextGenerator } from "../rewrite";
import { createTextGenerator } from "./generator";
import { getModel } from "./providers";

/**
 * Builds the rewrite engine's text generator from configuration: the model
 * from the `llm` section, the prompt budgets from the `rewrite` section.
 */
export function createLlmClient(
  config: Pick<AppConfig, "llm" | "rewrite">,
  env: NodeJS.ProcessEnv = process.env,
): TextGenerator {
  const model = getModel(config.llm.provider, config.llm.model, {
    ollamaBaseUrl: env["OLLAMA_BASE_URL"],
    lmstudioBaseUrl: env["LMSTUDIO_BASE_URL"],
  });

  return createTextGenerator(model, {
    temperature: config.llm.temperature,
    maxOutputTokens: config.llm.maxOutputTokens,
    bodyBudget: config.rewrite.bodyBudget,
    captionBudget: config.rewrite.captionBudget,
  });
}
