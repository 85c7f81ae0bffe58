import { z } from "zod/v3";

export const providerNames = [
  "anthropic",
  "openai",
  "gemini",
  "ollama",
  "lmstudio",
] as const;

export const feedDialects = ["decrypt", "beincrypto"] as const;

const sourceConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  dialect: z.enum(feedDialects),
  articleSelector: z.string().min(1).default("article p"),
  footer: z.string().optional(),
});

// Times stay strings here: a bad "HH:MM" drops that time, not the whole file.
const scheduleEntrySchema = z.object({
  source: z.string().min(1),
  category: z.string().min(1),
  time: z.array(z.string()).min(1),
});

const TELEGRAM_CAPTION_LIMIT = 1024;

export const appConfigSchema = z
  .object({
    llm: z.object({
      provider: z.enum(providerNames),
      model: z.string().min(1),
      temperature: z.number().min(0).max(1).default(0.7),
      maxOutputTokens: z.number().int().positive().default(500),
    }),
    rewrite: z
      .object({
        // Posts with an image go out as a photo caption.
        maxLength: z
          .number()
          .int()
          .positive()
          .max(
            TELEGRAM_CAPTION_LIMIT,
            `must not exceed the ${TELEGRAM_CAPTION_LIMIT}-character Telegram caption limit`,
          )
          .default(1000),
        maxTries: z.number().int().positive().default(3),
        bodyBudget: z.number().int().positive().default(400),
        captionBudget: z.number().int().positive().default(77),
        footer: z.string().default(""),
      })
      .default({}),
    sources: z.array(sourceConfigSchema).min(1),
    schedule: z.array(scheduleEntrySchema).default([]),
    scheduler: z
      .object({
        jitterSeconds: z.number().nonnegative().default(30),
        misfireGraceSeconds: z.number().positive().default(60),
        shutdownGraceSeconds: z.number().nonnegative().default(30),
      })
      .default({}),
    feeds: z
      .object({
        stalenessHours: z.number().positive().default(24),
        fetchTimeoutMs: z.number().int().positive().default(30000),
      })
      .default({}),
    image: z
      .object({
        width: z.number().int().positive().default(800),
        height: z.number().int().positive().default(600),
        quality: z.number().int().min(1).max(100).default(85),
      })
      .default({}),
    paths: z
      .object({
        stateFile: z.string().min(1).default("./data/publish-state.json"),
        tmpDir: z.string().min(1).default("./tmp"),
      })
      .default({}),
    delivery: z
      .object({
        mirrorToServiceChannels: z.boolean().default(false),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "name"],
          message: `duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
  });

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type ScheduleEntryConfig = z.infer<typeof scheduleEntrySchema>;
export type ProviderName = (typeof providerNames)[number];
export type FeedDialect = (typeof feedDialects)[number];
