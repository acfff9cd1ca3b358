import { createMiddleware } from "hono/factory";
import type { FormGate, ParseResult } from "@/engine";
import type { FormGateError } from "@/errors";
import type { FormGateLogger } from "@/logging";
import type { StoredFile } from "@/storage";
import { createDiagnosticsLog } from "@/utils";

/** Response envelope sent when a request is rejected */
export interface FormGateErrorResponse {
  status: false;
  message: string;
  data: Record<string, unknown>;
}

export interface FormGateMiddlewareOptions {
  diagnostics?: boolean;
  logger?: FormGateLogger;
}

export interface FormGateEnv<TFile extends StoredFile = StoredFile> {
  Variables: {
    formGate: ParseResult<TFile>;
  };
}

type ErrorStatus = 400 | 413 | 415 | 500;

function toErrorStatus(error: FormGateError): ErrorStatus {
  switch (error.statusCode) {
    case 413:
      return 413;
    case 415:
      return 415;
    case 500:
      return 500;
    default:
      return 400;
  }
}

/**
 * Hono middleware that parses multipart requests through a gate.
 * The parsed result is available as `c.get("formGate")` in later handlers;
 * rejected requests are answered with the error envelope and status.
 *
 * @example
 * app.post("/avatar", formGateMiddleware(gate), (c) => {
 *   const { files } = c.get("formGate");
 *   return c.json({ status: true, message: "uploaded", data: { count: files.length } });
 * });
 */
export function formGateMiddleware<TFile extends StoredFile>(
  gate: FormGate<TFile>,
  options: FormGateMiddlewareOptions = {}
) {
  const log = createDiagnosticsLog("Hono", {
    diagnostics: options.diagnostics,
    logger: options.logger,
  });

  return createMiddleware<FormGateEnv<TFile>>(async (c, next) => {
    const request = c.req.raw;
    const result = await gate.parse(request.headers, request.body, {
      signal: request.signal,
    });

    if (result.isErr) {
      const { error } = result;
      log(`Rejected ${c.req.method} ${c.req.path}`, {
        code: error.code,
        logId: error.logId,
      });
      return c.json(
        {
          status: false,
          message: error.message,
          data: error.toJSON(),
        } satisfies FormGateErrorResponse,
        toErrorStatus(error)
      );
    }

    c.set("formGate", result.value);
    await next();
  });
}
