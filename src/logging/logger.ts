import { nanoid } from "nanoid";
import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = "info" | "warn" | "error";

export interface Log {
  atFunction: string;
  appName: string;
  message: string;
  data?: unknown;
  level?: LogLevel;
  log_id?: string;
}

/** Configuration for where and how much a formgate logger writes */
export interface LoggerConfig {
  /** Minimum level written. Default: 'info' */
  level?: LogLevel;
  /** File path to append NDJSON records to. Ignored when `stream` is set */
  destination?: string;
  /** Explicit pino destination, e.g. a test sink or a transport */
  stream?: DestinationStream;
}

/**
 * Creates the pino instance backing a logger.
 * Precedence: explicit stream, then file destination, then stdout.
 */
export function createPinoLogger(config?: LoggerConfig): Logger {
  const stream =
    config?.stream ??
    (config?.destination
      ? pino.destination({ dest: config.destination, mkdir: true })
      : pino.destination(1));

  return pino(
    {
      level: config?.level ?? "info",
      base: null,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    stream
  );
}

/**
 * Writes a single log record through the given pino instance.
 * @returns The log ID attached to the record, for correlating errors with log lines
 */
export function writeLog(instance: Logger, log: Log): string {
  if (!log.appName) {
    throw new Error(`Missing appName in log: ${JSON.stringify(log)}`);
  }

  const level = log.level ?? "info";
  const log_id = log.log_id ?? nanoid(6);

  instance[level]({
    log_id,
    appName: log.appName,
    atFunction: log.atFunction,
    message: log.message,
    data: log.data ?? null,
  });

  return log_id;
}
