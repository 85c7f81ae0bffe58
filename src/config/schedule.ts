// pattern: Functional Core
import type { Logger } from "pino";
import type { ScheduleEntryConfig } from "./schema";

export type TimeOfDay = {
  readonly hour: number;
  readonly minute: number;
};

export type ScheduleEntry = {
  readonly source: string;
  readonly category: string;
  readonly times: ReadonlyArray<TimeOfDay>;
};

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Parses a 24-hour UTC "HH:MM" string. Returns null when the string is not a
 * valid time of day.
 */
export function parseTimeOfDay(raw: string): TimeOfDay | null {
  const match = TIME_PATTERN.exec(raw.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`;
}

/** Daily cron expression firing at `time`; evaluate it in UTC. */
export function cronExpressionFor(time: TimeOfDay): string {
  return `${time.minute} ${time.hour} * * *`;
}

/** The latest UTC instant at or before `at` whose clock reads `time`. */
export function previousOccurrence(time: TimeOfDay, at: Date): Date {
  const candidate = new Date(
    Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), time.hour, time.minute),
  );
  if (candidate.getTime() > at.getTime()) {
    candidate.setUTCDate(candidate.getUTCDate() - 1);
  }
  return candidate;
}

/** The earliest UTC instant strictly after `at` whose clock reads `time`. */
export function nextOccurrence(time: TimeOfDay, at: Date): Date {
  const candidate = new Date(
    Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate(), time.hour, time.minute),
  );
  if (candidate.getTime() <= at.getTime()) {
    candidate.setUTCDate(candidate.getUTCDate() + 1);
  }
  return candidate;
}

/**
 * Turns the raw schedule section into entries the scheduler can arm.
 *
 * Entries naming an unknown source are dropped, as are individual unparseable
 * times; each rejection is logged and the rest of the schedule still loads.
 * Duplicate times within an entry collapse to one and come back sorted.
 */
export function resolveSchedule(
  entries: ReadonlyArray<ScheduleEntryConfig>,
  sourceNames: ReadonlySet<string>,
  logger: Logger,
): Array<ScheduleEntry> {
  const resolved: Array<ScheduleEntry> = [];

  entries.forEach((entry, index) => {
    if (!sourceNames.has(entry.source)) {
      logger.error(
        { index, source: entry.source, category: entry.category },
        "schedule entry names an unknown source, skipping",
      );
      return;
    }

    const times = new Map<string, TimeOfDay>();
    for (const raw of entry.time) {
      const time = parseTimeOfDay(raw);
      if (!time) {
        logger.error(
          { index, source: entry.source, category: entry.category, time: raw },
          "invalid schedule time, skipping",
        );
        continue;
      }
      times.set(formatTimeOfDay(time), time);
    }

    if (times.size === 0) {
      logger.error(
        { index, source: entry.source, category: entry.category },
        "schedule entry has no valid times, skipping",
      );
      return;
    }

    resolved.push({
      source: entry.source,
      category: entry.category.trim().toLowerCase(),
      times: [...times.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([, time]) => time),
    });
  });

  return resolved;
}
