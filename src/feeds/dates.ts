// pattern: Functional Core

export type DateCandidates = {
  readonly published?: unknown;
  readonly updated?: unknown;
  readonly created?: unknown;
};

const ISO_WITHOUT_ZONE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const RFC_WITHOUT_ZONE =
  /^([A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(:\d{2})?$/;

/**
 * Parses a feed timestamp (RFC 822 or ISO 8601). Timestamps that carry no
 * zone are read as UTC. Returns null for anything unparseable.
 */
export function parseFeedDate(raw: unknown): Date | null {
  if (typeof raw !== "string") return null;

  const value = raw.trim();
  if (value.length === 0) return null;

  let normalized = value;
  if (ISO_WITHOUT_ZONE.test(value)) {
    normalized = `${value.replace(" ", "T")}Z`;
  } else if (RFC_WITHOUT_ZONE.test(value)) {
    normalized = `${value} GMT`;
  }

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Picks the publication instant of an entry: `published`, then `updated`,
 * then `created`, and `now` only when none of them parses.
 */
export function resolvePublishedAt(candidates: DateCandidates, now: Date): Date {
  return (
    parseFeedDate(candidates.published) ??
    parseFeedDate(candidates.updated) ??
    parseFeedDate(candidates.created) ??
    now
  );
}
