// pattern: Functional Core
import type { JobOutcome } from "./types";

function heading(outcome: JobOutcome): string {
  return `[${outcome.source}/${outcome.category}]`;
}

/**
 * Renders the plain-text operator report for a job outcome.
 */
export function buildJobReport(outcome: JobOutcome): string {
  const head = heading(outcome);

  switch (outcome.status) {
    case "published":
      return [
        `${head} published: ${outcome.item.title}`,
        outcome.item.link,
        `length ${outcome.length}, attempts ${outcome.attempts}, ${outcome.withImage ? "with image" : "text only"}`,
        `channels: ${outcome.delivered.join(", ")}`,
      ].join("\n");

    case "no_news":
      return outcome.since
        ? `${head} no fresh news since ${outcome.since.toISOString()}`
        : `${head} no fresh news`;

    case "rewrite_too_long":
      return [
        `${head} rewrite too long: ${outcome.rewrittenLength} characters after ${outcome.attempts} attempts (limit ${outcome.maxLength})`,
        outcome.item.link,
        "",
        "Last attempt:",
        outcome.rewrittenNews,
      ].join("\n");

    case "delivery_failed":
      return [
        `${head} delivery failed: ${outcome.item.title}`,
        outcome.item.link,
        ...outcome.failed.map((f) => `- ${f.channel}: ${f.error}`),
        outcome.delivered.length > 0
          ? `delivered to: ${outcome.delivered.join(", ")}`
          : "delivered to: none",
      ].join("\n");

    case "cancelled":
      return outcome.item
        ? `${head} cancelled by shutdown before rewriting: ${outcome.item.title}`
        : `${head} cancelled by shutdown`;

    case "failed":
      return `${head} job failed: ${outcome.error}`;
  }
}
