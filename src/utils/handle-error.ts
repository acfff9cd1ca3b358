import type { FormGateError } from "@/errors";
import type { FormGateLogger } from "@/logging";
import { Err, type Result } from "./result";

/**
 * Parameters for the handleError utility.
 *
 * @property error - The error that ended the session
 * @property logger - Logger to report through; when omitted nothing is logged
 * @property atFunction - Name of the calling function for log attribution; auto-inferred from stack trace when omitted
 */
export interface HandleErrorParams<E extends FormGateError> {
  error: E;
  logger?: FormGateLogger;
  atFunction?: string;
}

const CALLER_LINE_REGEX = /at\s+(\S+)\s+/;

function inferCallerName(): string {
  const stack = new Error("capture stack trace").stack;
  const callerLine = stack?.split("\n")[3] ?? "";
  const match = callerLine.match(CALLER_LINE_REGEX);
  return match?.[1] ?? "unknown";
}

/**
 * Logs an error via the given logger and returns it as a typed Err result.
 * The log ID is stored on the error as `logId` so callers can correlate a
 * client-facing failure with the log line.
 *
 * @example
 * ```typescript
 * return handleError({
 *   error: new LimitError("TOO_MANY_FILES", "too many files"),
 *   logger,
 *   atFunction: "parse",
 * });
 * ```
 */
export function handleError<E extends FormGateError>(
  params: HandleErrorParams<E>
): Result<never, E> {
  const { error, logger } = params;
  if (logger) {
    error.logId = logger.error({
      atFunction: params.atFunction ?? inferCallerName(),
      message: error.message,
      data: {
        ...error.toJSON(),
        cleanupFailures: error.cleanupFailures.map(String),
      },
    });
  }
  return Err(error);
}
