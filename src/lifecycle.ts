// pattern: Imperative Shell
import type { Logger } from "pino";
import type { PublishScheduler } from "./scheduler";

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly scheduler: Pick<PublishScheduler, "shutdown" | "drain">;
  readonly shutdownGraceMs: number;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers for graceful shutdown and returns the
 * shutdown routine itself.
 *
 * - Ignores repeated signals once shutdown has begun
 * - Removes every scheduled job before anything else, so no new run starts
 * - Gives in-flight runs up to `shutdownGraceMs` to finish their current step
 * - Calls `process.exit(0)` whether or not the runs settled in time
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    try {
      deps.scheduler.shutdown();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error stopping scheduler");
    }

    try {
      const drained = await deps.scheduler.drain(deps.shutdownGraceMs);
      if (drained) {
        deps.logger.info("in-flight jobs settled");
      } else {
        deps.logger.warn(
          { graceMs: deps.shutdownGraceMs },
          "in-flight jobs still running after grace period",
        );
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error draining jobs");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  return shutdown;
}
