import { z } from "zod/v3";
import type { ProviderName } from "./schema";

export type Secrets = {
  readonly telegramBotToken: string;
  readonly targetChannels: ReadonlyArray<string>;
  readonly serviceChannels: ReadonlyArray<string>;
};

const providerKeyVariables: Record<ProviderName, string | null> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_GENERATIVE_AI_API_KEY",
  ollama: null,
  lmstudio: null,
};

const requiredString = (name: string) =>
  z.string({ required_error: `${name} is not set` }).trim().min(1, `${name} is empty`);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: requiredString("TELEGRAM_BOT_TOKEN"),
  TELEGRAM_TARGET_CHANNELS: requiredString("TELEGRAM_TARGET_CHANNELS"),
  TELEGRAM_SERVICE_CHANNELS: z.string().optional(),
});

/**
 * Splits a comma-separated channel list. Usernames get an `@` prefix;
 * numeric chat ids (including negative channel ids) are left alone.
 */
export function parseChannelList(raw: string | undefined): Array<string> {
  if (!raw) return [];

  return raw
    .split(",")
    .map((channel) => channel.trim())
    .filter((channel) => channel.length > 0)
    .map((channel) =>
      channel.startsWith("@") || /^-?\d+$/.test(channel) ? channel : `@${channel}`,
    );
}

/**
 * Reads delivery credentials and the generation provider's API key from the
 * environment. Values are only checked for presence; the key itself is read
 * again by the AI SDK provider.
 */
export function loadSecrets(
  env: NodeJS.ProcessEnv,
  provider: ProviderName,
): Secrets {
  const keyVariable = providerKeyVariables[provider];

  const issues: Array<string> = [];

  const result = envSchema.safeParse(env);
  if (!result.success) {
    issues.push(...result.error.issues.map((i) => i.message));
  }

  if (keyVariable) {
    const key = requiredString(keyVariable).safeParse(env[keyVariable]);
    if (!key.success) {
      issues.push(...key.error.issues.map((i) => i.message));
    }
  }

  if (!result.success || issues.length > 0) {
    throw new Error(
      `missing environment configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
    );
  }

  const targetChannels = parseChannelList(result.data.TELEGRAM_TARGET_CHANNELS);
  if (targetChannels.length === 0) {
    throw new Error(
      "missing environment configuration:\n  - TELEGRAM_TARGET_CHANNELS lists no channels",
    );
  }

  return {
    telegramBotToken: result.data.TELEGRAM_BOT_TOKEN,
    targetChannels,
    serviceChannels: parseChannelList(result.data.TELEGRAM_SERVICE_CHANNELS),
  };
}
