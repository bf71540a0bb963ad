import pino from "pino";

/**
 * Creates the service's pino logger: JSON lines, string level labels,
 * ISO 8601 timestamps, stdout unless a destination is given.
 *
 * @param level - Overrides the `LOG_LEVEL` env var (default "info")
 * @param destination - Where to write log lines (tests capture output this way)
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
