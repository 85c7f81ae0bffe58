import type { ChannelFailure } from "../delivery";
import type { NewsItem } from "../feeds";

type JobKey = {
  readonly source: string;
  readonly category: string;
};

/**
 * Terminal outcome of one publish job. Each outcome yields exactly one
 * operator report.
 */
export type JobOutcome =
  | (JobKey & {
      readonly status: "published";
      readonly item: NewsItem;
      readonly length: number;
      readonly attempts: number;
      readonly withImage: boolean;
      readonly delivered: ReadonlyArray<string>;
    })
  | (JobKey & { readonly status: "no_news"; readonly since: Date | null })
  | (JobKey & {
      readonly status: "rewrite_too_long";
      readonly item: NewsItem;
      readonly rewrittenNews: string;
      readonly rewrittenLength: number;
      readonly maxLength: number;
      readonly attempts: number;
    })
  | (JobKey & {
      readonly status: "delivery_failed";
      readonly item: NewsItem;
      readonly delivered: ReadonlyArray<string>;
      readonly failed: ReadonlyArray<ChannelFailure>;
    })
  | (JobKey & { readonly status: "cancelled"; readonly item: NewsItem | null })
  | (JobKey & { readonly status: "failed"; readonly error: string });

export type JobStatus = JobOutcome["status"];
