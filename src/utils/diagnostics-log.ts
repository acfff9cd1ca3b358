import type { FormGateLogger } from "@/logging";

export type DiagnosticsLog = (message: string, data?: unknown) => void;

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger?: FormGateLogger;
}

/**
 * Creates the diagnostics log for one formgate component. Messages are
 * dropped unless `diagnostics` is set; they go to `logger.info` when a
 * logger is configured and to console.log otherwise.
 *
 * @param prefix - Component identifier e.g. "FormGate", "Hono"
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): DiagnosticsLog {
  if (!params.diagnostics) {
    return () => undefined;
  }

  const { logger } = params;
  if (!logger) {
    return (message, data) => console.log(`[${prefix}] ${message}`, data ?? "");
  }

  return (message, data) => {
    logger.info({ atFunction: prefix, message: `[${prefix}] ${message}`, data });
  };
}
