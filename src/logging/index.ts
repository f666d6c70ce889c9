import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { Config } from "../config";

export type AppLogger = Logger;

export interface CreateLoggerOptions extends LoggerOptions {
  /**
   * Override the default log level derived from configuration.
   */
  level?: LoggerOptions["level"];
  /**
   * Where log lines are written. Defaults to stderr so stdout stays free for reports.
   */
  destination?: DestinationStream;
}

export function createLogger(
  config: Config,
  options: CreateLoggerOptions = {},
): AppLogger {
  const { level, destination, ...rest } = options;

  return pino(
    {
      level: level ?? config.logLevel,
      base: {
        service: "query-stats-analyzer",
        environment: config.env,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      ...rest,
    },
    destination ?? pino.destination(2),
  );
}
