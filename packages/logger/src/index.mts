import { pino } from "pino";

import type { DestinationStream, Logger, LoggerOptions } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;

export type LoggerFactoryOptions = LoggerOptions;

/**
 * Builds a `BaseLogger` over a pino instance.
 * Strings become `msg` with the meta merged into the record; an `Error` is logged
 * under pino's `err` key and its message becomes `msg`.
 * Pass a `destination` to write somewhere other than stdout.
 */
export const loggerFactory = (
  options: LoggerFactoryOptions = {},
  destination?: DestinationStream,
) => {
  const pinoLogger: Logger =
    destination === undefined ? pino(options) : pino(options, destination);

  const logMessage = (
    level: LoggerLevels,
    message: LoggerMessage,
    meta?: LoggerMeta,
  ): void => {
    if (message instanceof Error) {
      pinoLogger[level]({ ...meta, err: message }, message.message);
      return;
    }
    pinoLogger[level](meta ?? {}, message);
  };

  const logger: BaseLogger = {
    trace: (message, meta) => logMessage("trace", message, meta),
    debug: (message, meta) => logMessage("debug", message, meta),
    info: (message, meta) => logMessage("info", message, meta),
    warn: (message, meta) => logMessage("warn", message, meta),
    error: (message, meta) => logMessage("error", message, meta),
    fatal: (message, meta) => logMessage("fatal", message, meta),
  };

  return { logger, pinoLogger };
};

export default loggerFactory;
