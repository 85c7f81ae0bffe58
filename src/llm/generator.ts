// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { TextGenerator } from "../rewrite";
import {
  buildCaptionPrompt,
  buildRewritePrompt,
  captionSystemPrompt,
  rewriteSystemPrompt,
} from "./prompts";

export type TextGeneratorOptions = {
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly bodyBudget: number;
  readonly captionBudget: number;
};

/**
 * Binds the rewrite and caption prompts to a language model. Each call is one
 * generation request; failures and empty completions throw.
 */
export function createTextGenerator(
  model: LanguageModel,
  options: TextGeneratorOptions,
): TextGenerator {
  const complete = async (system: string, prompt: string): Promise<string> => {
    const response = await generateText({
      model,
      system,
      prompt,
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
    });

    const text = response.text.trim();
    if (text.length === 0) {
      throw new Error("language model returned an empty completion");
    }
    return text;
  };

  return {
    rewrite: (text) =>
      complete(
        rewriteSystemPrompt(options.bodyBudget),
        buildRewritePrompt(text, options.bodyBudget),
      ),
    summarize: (text) =>
      complete(
        captionSystemPrompt(options.captionBudget),
        buildCaptionPrompt(text, options.captionBudget),
      ),
  };
}
