import pino from "pino";

/**
 * Creates the process-wide pino logger.
 *
 * - Level labels instead of numbers
 * - ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaulting to `info`
 * - Plain JSON on stdout
 *
 * @param level - Optional override for the log level
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
