/**
 * pino-backed implementation of the engine's Logger.
 */

import { destination as pinoDestination, pino, type DestinationStream, type Logger as PinoLogger } from "pino";

import type { Logger } from "@breadlog/core";

export const LOG_LEVEL_ENV = "BREADLOG_LOG_LEVEL";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

/**
 * NDJSON logger. Writes synchronously to stdout unless given a destination.
 */
export function createPinoLogger(level: LogLevel, destination?: DestinationStream): PinoLogger {
  return pino(
    { level, base: { name: "breadlog" } },
    destination ?? pinoDestination({ dest: 1, sync: true }),
  );
}

export function adaptLogger(logger: PinoLogger): Logger {
  return {
    debug: (message, fields) => logger.debug(fields ?? {}, message),
    info: (message, fields) => logger.info(fields ?? {}, message),
    warn: (message, fields) => logger.warn(fields ?? {}, message),
    error: (message, fields) => logger.error(fields ?? {}, message),
  };
}

/** Logger for the command line, leveled by `BREADLOG_LOG_LEVEL`. */
export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return adaptLogger(createPinoLogger(resolveLogLevel(env[LOG_LEVEL_ENV])));
}
