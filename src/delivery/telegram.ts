// pattern: Imperative Shell
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { Logger } from "pino";
import { z } from "zod/v3";

const TELEGRAM_API = "https://api.telegram.org";
const MAX_MESSAGE_LENGTH = 4096;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export type ChannelFailure = {
  readonly channel: string;
  readonly error: string;
};

export type DeliveryResult =
  | { readonly success: true; readonly delivered: ReadonlyArray<string> }
  | {
      readonly success: false;
      readonly delivered: ReadonlyArray<string>;
      readonly failed: ReadonlyArray<ChannelFailure>;
    };

export type TelegramPoster = {
  /**
   * Posts rewritten news to every target channel. With an image the text is
   * sent as the photo's caption. Every channel is attempted; the result is a
   * success only when all of them accepted the post.
   */
  publishNews(text: string, imagePath: string | null): Promise<DeliveryResult>;
  /** Plain-text status message to the service channels. Never throws. */
  sendServiceReport(text: string): Promise<void>;
};

export type TelegramPosterOptions = {
  readonly token: string;
  readonly targetChannels: ReadonlyArray<string>;
  readonly serviceChannels: ReadonlyArray<string>;
  readonly mirrorToServiceChannels: boolean;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

type Payload =
  | { readonly kind: "message"; readonly body: Record<string, unknown> }
  | { readonly kind: "photo"; readonly photo: Blob; readonly fileName: string; readonly fields: Record<string, string> };

function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  return chars.length <= limit ? text : `${chars.slice(0, limit - 1).join("")}…`;
}

/**
 * Creates a Telegram Bot API client for news posts and operator reports.
 *
 * @param options - Bot token, target and service channel lists, mirroring flag, request timeout and logger
 * @returns A TelegramPoster whose publishNews() tries every target channel and whose sendServiceReport() never throws
 */
export function createTelegramPoster(options: TelegramPosterOptions): TelegramPoster {
  const { logger } = options;

  function apiUrl(method: string): string {
    return `${TELEGRAM_API}/bot${options.token}/${method}`;
  }

  async function call(method: string, chatId: string, payload: Payload): Promise<void> {
    let init: RequestInit;
    if (payload.kind === "photo") {
      const form = new FormData();
      form.append("chat_id", chatId);
      for (const [key, value] of Object.entries(payload.fields)) {
        form.append(key, value);
      }
      form.append("photo", payload.photo, payload.fileName);
      init = { method: "POST", body: form };
    } else {
      init = {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: chatId, ...payload.body }),
      };
    }

    const response = await fetch(apiUrl(method), {
      ...init,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    let raw: unknown;
    try {
      raw = await response.json();
    } catch {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const parsed = apiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`unexpected ${method} response (HTTP ${response.status})`);
    }
    if (!parsed.data.ok) {
      throw new Error(parsed.data.description ?? `${method} rejected (HTTP ${response.status})`);
    }
  }

  async function deliver(
    method: string,
    channels: ReadonlyArray<string>,
    payload: Payload,
  ): Promise<DeliveryResult> {
    const delivered: Array<string> = [];
    const failed: Array<ChannelFailure> = [];

    for (const channel of channels) {
      try {
        await call(method, channel, payload);
        delivered.push(channel);
        logger.debug({ channel, method }, "telegram delivery succeeded");
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        failed.push({ channel, error });
        logger.error({ channel, method, error }, "telegram delivery failed");
      }
    }

    if (failed.length > 0) {
      return { success: false, delivered, failed };
    }
    return { success: true, delivered };
  }

  return {
    async publishNews(text, imagePath) {
      const channels = options.mirrorToServiceChannels
        ? [...options.targetChannels, ...options.serviceChannels]
        : [...options.targetChannels];

      if (imagePath) {
        const bytes = await readFile(imagePath);
        return deliver("sendPhoto", channels, {
          kind: "photo",
          photo: new Blob([bytes], { type: "image/jpeg" }),
          fileName: basename(imagePath),
          fields: { caption: text, parse_mode: "HTML" },
        });
      }

      return deliver("sendMessage", channels, {
        kind: "message",
        body: { text, parse_mode: "HTML", disable_web_page_preview: false },
      });
    },

    async sendServiceReport(text) {
      if (options.serviceChannels.length === 0) {
        logger.info({ report: text }, "no service channels configured, report not sent");
        return;
      }

      const result = await deliver("sendMessage", options.serviceChannels, {
        kind: "message",
        body: { text: truncate(text, MAX_MESSAGE_LENGTH), disable_web_page_preview: true },
      });
      if (!result.success) {
        logger.warn({ failed: result.failed }, "service report not delivered to every channel");
      }
    },
  };
}
