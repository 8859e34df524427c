import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: "xlsx2csv"
    }
  };

  return destination ? pino(options, destination) : pino(options);
}

// Library default: callers opt in to output by passing their own logger.
export const silentLogger: Logger = pino({ level: "silent" });
