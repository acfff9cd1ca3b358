import { validateConfig } from "@/config";
import { type FormGateError, ParseError } from "@/errors";
import { createLimitEnforcer, resolveLimits } from "@/limits";
import { BoundaryScanner, extractBoundary } from "@/parser";
import { compileRules, createSelector } from "@/selector";
import type { StoredFile } from "@/storage";
import {
  type BodyInput,
  createDiagnosticsLog,
  handleError,
  Ok,
  type Result,
} from "@/utils";
import { createMultipartReader } from "./multipart-reader";
import { getContentType, scanEvents } from "./part-stream";
import { ParseSession } from "./session";
import type {
  FormGate,
  FormGateConfig,
  HeadersInput,
  MultipartReader,
  ParseOptions,
  ParseResult,
} from "./types";

/**
 * Creates a multipart gate: validates the configuration and compiles the
 * rules once, then reads any number of requests independently.
 *
 * @throws {ConfigError} when the configuration or the rules are invalid
 *
 * @example
 * const gate = createFormGate({
 *   storage: new DiskStorage({ destination: "./uploads" }),
 *   rules: [{ kind: "single", name: "avatar", allowedMimeTypes: ["image/*"] }],
 *   limits: { maxFileSize: 2 * 1024 * 1024 },
 * });
 * const result = await gate.parse(req.headers, req);
 */
export function createFormGate<TFile extends StoredFile>(
  config: FormGateConfig<TFile>
): FormGate<TFile> {
  validateConfig(config);

  const frozen: Readonly<FormGateConfig<TFile>> = Object.freeze({ ...config });
  const limits = resolveLimits(config.limits);
  const rules = compileRules(config.rules ?? [], config.unknownFieldPolicy);
  const log = createDiagnosticsLog("FormGate", {
    diagnostics: config.diagnostics,
    logger: config.logger,
  });

  const open = (
    headers: HeadersInput,
    body: BodyInput | null,
    options: ParseOptions = {}
  ): Result<MultipartReader<TFile>, FormGateError> => {
    const boundary = extractBoundary(getContentType(headers));
    if (boundary.isErr) {
      return handleError({
        error: boundary.error,
        logger: config.logger,
        atFunction: "open",
      });
    }
    if (body === null) {
      return handleError({
        error: new ParseError("UNEXPECTED_EOF", "request has no body"),
        logger: config.logger,
        atFunction: "open",
      });
    }

    const scanner = new BoundaryScanner(boundary.value, {
      maxHeaderSize: limits.maxHeaderSize,
    });
    const enforcer = createLimitEnforcer(limits, {
      mimeTypes: config.allowedMimeTypes,
      extensions: config.allowedExtensions,
    });
    const session = new ParseSession<TFile>(config.mixedKeys ?? "allow");
    session.start();

    return Ok(
      createMultipartReader({
        config: frozen,
        limits,
        rules,
        selector: createSelector(rules),
        enforcer,
        session,
        events: scanEvents(body, scanner, enforcer, options.signal, log),
        signal: options.signal,
        log,
      })
    );
  };

  const parse = async (
    headers: HeadersInput,
    body: BodyInput | null,
    options: ParseOptions = {}
  ): Promise<Result<ParseResult<TFile>, FormGateError>> => {
    const opened = open(headers, body, options);
    if (opened.isErr) {
      return opened;
    }
    const reader = opened.value;

    for (;;) {
      const next = await reader.nextPart();
      if (next.isErr) {
        return next;
      }
      const part = next.value;
      if (part === null) {
        return Ok(reader.snapshot());
      }

      const read = part.isFile ? await reader.store(part) : await part.text();
      if (read.isErr) {
        return read;
      }
    }
  };

  return { config: frozen, open, parse };
}
