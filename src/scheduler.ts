// pattern: Imperative Shell
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import {
  cronExpressionFor,
  formatTimeOfDay,
  nextOccurrence,
  previousOccurrence,
} from "./config";
import type { TimeOfDay } from "./config";

/**
 * Work run by a trigger. The signal aborts when the scheduler shuts down;
 * the job may use it to stop between steps.
 */
export type JobRun = (signal: AbortSignal) => Promise<unknown>;

export type JobEvent =
  | { readonly type: "succeeded"; readonly jobId: string; readonly durationMs: number }
  | { readonly type: "failed"; readonly jobId: string; readonly error: string }
  | { readonly type: "cancelled"; readonly jobId: string }
  | {
      readonly type: "missed";
      readonly jobId: string;
      readonly scheduledFor: Date;
      readonly lateByMs: number;
    };

export type PublishSchedulerOptions = {
  readonly logger: Logger;
  /** Upper bound of the random delay added before each run. */
  readonly jitterMs: number;
  /** A trigger dispatched later than this after its time is skipped as missed. */
  readonly misfireGraceMs: number;
  readonly random?: () => number;
  readonly now?: () => Date;
  /** Awaited before the run counts as settled, so `drain` covers it. */
  readonly onJobEvent?: (event: JobEvent) => void | Promise<void>;
};

export type PublishScheduler = {
  /** Arms a daily UTC trigger, replacing any job registered under `jobId`. */
  readonly schedule: (jobId: string, time: TimeOfDay, run: JobRun) => void;
  readonly remove: (jobId: string) => boolean;
  readonly jobIds: () => ReadonlyArray<string>;
  readonly describeJobs: () => string;
  readonly start: () => void;
  /** Removes every job, then stops the trigger loop and cancels pending jitter waits. */
  readonly shutdown: () => void;
  /** Resolves true once in-flight runs settle, false if `timeoutMs` passes first. */
  readonly drain: (timeoutMs: number) => Promise<boolean>;
  readonly isRunning: () => boolean;
};

type Job = {
  readonly id: string;
  readonly time: TimeOfDay;
  readonly run: JobRun;
  readonly task: ScheduledTask;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Creates the scheduler that arms one node-cron task per publishing job.
 *
 * Every trigger is dispatched on its own: lateness is measured against the
 * job's most recent UTC occurrence, a random jitter delay is waited out, and
 * the run's outcome is reported through `onJobEvent`. A failing run never
 * disarms its trigger.
 *
 * @param options - Logger, jitter and misfire settings, plus optional clock,
 *   random source and event listener overrides for tests.
 * @returns A scheduler that stays idle until `start` is called.
 */
export function createPublishScheduler(options: PublishSchedulerOptions): PublishScheduler {
  const { logger } = options;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  const jobs = new Map<string, Job>();
  const inFlight = new Set<Promise<void>>();
  const shutdownController = new AbortController();
  let running = false;

  async function emit(event: JobEvent): Promise<void> {
    try {
      await options.onJobEvent?.(event);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ jobId: event.jobId, error: message }, "job event listener failed");
    }
  }

  async function dispatch(job: Job, firedFor: Date): Promise<void> {
    const startedAt = now();
    const lateByMs = startedAt.getTime() - firedFor.getTime();

    if (lateByMs > options.misfireGraceMs) {
      logger.warn(
        { jobId: job.id, scheduledFor: firedFor.toISOString(), lateByMs },
        "job run missed",
      );
      await emit({ type: "missed", jobId: job.id, scheduledFor: firedFor, lateByMs });
      return;
    }

    const delayMs = Math.floor(random() * options.jitterMs);
    if (delayMs > 0) {
      try {
        await sleep(delayMs, undefined, { signal: shutdownController.signal });
      } catch (err) {
        if (isAbortError(err)) {
          logger.info({ jobId: job.id }, "job run cancelled during jitter wait");
          await emit({ type: "cancelled", jobId: job.id });
          return;
        }
        throw err;
      }
    }

    logger.info({ jobId: job.id, jitterMs: delayMs }, "job run starting");
    const began = Date.now();
    try {
      await job.run(shutdownController.signal);
      const durationMs = Date.now() - began;
      logger.info({ jobId: job.id, durationMs }, "job run succeeded");
      await emit({ type: "succeeded", jobId: job.id, durationMs });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ jobId: job.id, error: message }, "job run failed");
      await emit({ type: "failed", jobId: job.id, error: message });
    }
  }

  // node-cron's tick Date holds the UTC wall clock read in the host zone, so
  // the fire time is taken from the job's own time of day instead.
  function fire(job: Job): void {
    if (!running) return;
    const firedFor = previousOccurrence(job.time, now());

    const execution = dispatch(job, firedFor).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ jobId: job.id, error: message }, "job dispatch failed");
    });
    inFlight.add(execution);
    void execution.finally(() => inFlight.delete(execution));
  }

  function remove(jobId: string): boolean {
    const job = jobs.get(jobId);
    if (!job) return false;
    job.task.stop();
    jobs.delete(jobId);
    logger.debug({ jobId }, "job removed");
    return true;
  }

  return {
    schedule: (jobId, time, run) => {
      if (shutdownController.signal.aborted) {
        throw new Error("scheduler has been shut down");
      }
      const replaced = remove(jobId);

      let job: Job | undefined;
      const task = cron.schedule(
        cronExpressionFor(time),
        () => {
          if (job) fire(job);
        },
        {
          scheduled: false,
          timezone: "Etc/UTC",
          name: jobId,
          recoverMissedExecutions: true,
        },
      );
      job = { id: jobId, time, run, task };
      jobs.set(jobId, job);

      if (running) task.start();
      logger.info({ jobId, time: formatTimeOfDay(time), replaced }, "job scheduled");
    },

    remove,

    jobIds: () => [...jobs.keys()],

    describeJobs: () => {
      if (jobs.size === 0) return "No scheduled jobs.";
      const at = now();
      const lines = ["Scheduled jobs (UTC):"];
      for (const job of jobs.values()) {
        lines.push(
          `${job.id} at ${formatTimeOfDay(job.time)}, next run ${nextOccurrence(job.time, at).toISOString()}`,
        );
      }
      return lines.join("\n");
    },

    start: () => {
      if (running || shutdownController.signal.aborted) return;
      running = true;
      for (const job of jobs.values()) {
        job.task.start();
      }
      logger.info({ jobCount: jobs.size }, "scheduler started");
    },

    shutdown: () => {
      const jobCount = jobs.size;
      for (const jobId of [...jobs.keys()]) {
        remove(jobId);
      }
      running = false;
      shutdownController.abort();
      logger.info({ removed: jobCount, inFlight: inFlight.size }, "scheduler stopped");
    },

    drain: async (timeoutMs) => {
      if (inFlight.size === 0) return true;

      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<false>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      });
      const settled = Promise.allSettled([...inFlight]).then(() => true as const);

      try {
        return await Promise.race([settled, timedOut]);
      } finally {
        clearTimeout(timer);
      }
    },

    isRunning: () => running,
  };
}
