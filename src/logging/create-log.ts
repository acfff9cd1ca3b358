import { createPinoLogger, type Log, type LoggerConfig, writeLog } from "./logger";

type LogInput = Omit<Log, "appName" | "level">;

/** Structured logger accepted anywhere formgate takes a `logger` option */
export interface FormGateLogger {
  info: (input: LogInput) => string;
  warn: (input: LogInput) => string;
  error: (input: LogInput) => string;
}

/**
 * Creates a logger instance bound to a specific app name.
 * One pino instance is created per logger and reused for every record.
 * @param appName - The application name stamped on every record
 * @param config - Optional level and destination settings
 */
export const createLogger = (
  appName: string,
  config?: LoggerConfig
): FormGateLogger => {
  const instance = createPinoLogger(config);
  return {
    info: (input) => writeLog(instance, { ...input, appName, level: "info" }),
    warn: (input) => writeLog(instance, { ...input, appName, level: "warn" }),
    error: (input) =>
      writeLog(instance, { ...input, appName, level: "error" }),
  };
};
