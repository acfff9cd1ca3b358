import {
  FormGateError,
  LimitError,
  ParseError,
  StorageError,
  toFormGateError,
} from "@/errors";
import type { LimitEnforcer, ResolvedLimits } from "@/limits";
import { type PartHeaders, parsePartHeaders, type ScanEvent } from "@/parser";
import type { CompiledRules, SelectorEngine } from "@/selector";
import type { FileMeta, StoredFile } from "@/storage";
import {
  cancelledError,
  type DiagnosticsLog,
  Err,
  handleError,
  Ok,
  type Result,
  safeTry,
} from "@/utils";
import { type BodyProgress, partBody } from "./part-stream";
import type { ParseSession } from "./session";
import type { FormGateConfig, FormPart, MultipartReader } from "./types";

export interface ReaderContext<TFile extends StoredFile> {
  config: Readonly<FormGateConfig<TFile>>;
  limits: ResolvedLimits;
  rules: CompiledRules;
  selector: SelectorEngine;
  enforcer: LimitEnforcer;
  session: ParseSession<TFile>;
  events: AsyncGenerator<ScanEvent, void, undefined>;
  signal: AbortSignal | undefined;
  log: DiagnosticsLog;
}

interface OpenPart {
  readonly handle: FormPart;
  readonly headers: PartHeaders;
  readonly progress: BodyProgress;
  /** Plain field bytes, recorded on the session once the part ends */
  readonly chunks: Uint8Array[] | null;
  taken: boolean;
  reading: boolean;
}

function checkRequired(selector: SelectorEngine, rules: CompiledRules): void {
  const [missing] = selector.missingRequired();
  if (missing === undefined) {
    return;
  }
  throw new LimitError(
    "MISSING_FIELD",
    `missing required file field '${missing}'`,
    {
      data: { field: missing, minCount: rules.byName.get(missing)?.minCount },
    }
  );
}

/** Pulls a generator to completion, discarding what it yields */
async function exhaust(
  source: AsyncGenerator<Uint8Array, void, undefined>
): Promise<void> {
  let next = await source.next();
  while (!next.done) {
    next = await source.next();
  }
}

/**
 * Builds the reader over one started session. Parts are checked against
 * the selector and limits when they are opened; bodies are counted against
 * the part limit as they are read.
 */
export function createMultipartReader<TFile extends StoredFile>(
  ctx: ReaderContext<TFile>
): MultipartReader<TFile> {
  let current: OpenPart | null = null;
  let failure: FormGateError | null = null;

  /** Moves the reader into its failed state once; later calls get the same error */
  async function settle(
    caught: unknown,
    atFunction: string
  ): Promise<FormGateError> {
    if (failure) {
      return failure;
    }
    // foreign errors raised while the caller was cancelling are reported as CANCELLED
    const error =
      ctx.signal?.aborted && !(caught instanceof FormGateError)
        ? cancelledError(ctx.signal)
        : toFormGateError(caught);
    failure = error;
    current = null;
    ctx.session.abort();

    for (const file of ctx.session.files) {
      const cleaned = await safeTry(() => ctx.config.storage.cleanup(file));
      if (cleaned.isErr) {
        error.cleanupFailures.push(cleaned.error);
        ctx.config.logger?.warn({
          atFunction,
          message: `Failed to clean up stored file '${file.fileName}'`,
          data: { storageKey: file.storageKey, error: String(cleaned.error) },
        });
      }
    }

    const closed = await safeTry(() => ctx.events.return(undefined));
    if (closed.isErr) {
      ctx.log("Failed to close event stream", closed.error);
    }
    handleError({ error, logger: ctx.config.logger, atFunction });
    return error;
  }

  async function* readBody(
    part: OpenPart
  ): AsyncGenerator<Uint8Array, void, undefined> {
    part.reading = true;
    try {
      for await (const chunk of partBody(
        ctx.events,
        part.progress,
        ctx.enforcer.observePartData
      )) {
        part.chunks?.push(chunk);
        yield chunk;
      }
    } finally {
      part.reading = false;
    }

    if (part.chunks) {
      ctx.session.addField({
        name: part.headers.fieldName,
        value: Buffer.concat(part.chunks, part.progress.bytes).toString("utf8"),
      });
    }
  }

  function take(handle: FormPart): OpenPart {
    if (current?.handle !== handle) {
      throw new Error(`part '${handle.fieldName}' is no longer readable`);
    }
    if (current.taken) {
      throw new Error(`body of part '${handle.fieldName}' was already read`);
    }
    current.taken = true;
    return current;
  }

  async function collect(
    handle: FormPart,
    atFunction: string
  ): Promise<Result<Buffer, FormGateError>> {
    if (failure) {
      return Err(failure);
    }
    const part = take(handle);
    try {
      const chunks: Uint8Array[] = [];
      for await (const chunk of readBody(part)) {
        chunks.push(chunk);
      }
      return Ok(Buffer.concat(chunks, part.progress.bytes));
    } catch (caught) {
      return Err(await settle(caught, atFunction));
    }
  }

  async function* stream(
    handle: FormPart
  ): AsyncGenerator<Uint8Array, void, undefined> {
    if (failure) {
      throw failure;
    }
    const part = take(handle);
    try {
      yield* readBody(part);
    } catch (caught) {
      throw await settle(caught, "stream");
    }
  }

  function openPart(
    headers: PartHeaders,
    index: number,
    maxSize: number
  ): FormPart {
    const isFile = headers.fileName !== undefined;
    const handle: FormPart = Object.freeze({
      fieldName: headers.fieldName,
      fileName: headers.fileName,
      contentType: headers.contentType,
      index,
      isFile,
      maxSize,
      text: async () => {
        const bytes = await collect(handle, "text");
        return bytes.isErr ? bytes : Ok(bytes.value.toString("utf8"));
      },
      bytes: () => collect(handle, "bytes"),
      stream: () => stream(handle),
    });

    const part: OpenPart = {
      handle,
      headers,
      progress: { ended: false, bytes: 0 },
      chunks: isFile ? null : [],
      taken: false,
      reading: false,
    };
    current = part;
    return handle;
  }

  /** Applies the selector and opening limits; null means the part was skipped */
  async function admit(
    headers: PartHeaders,
    index: number
  ): Promise<FormPart | null> {
    if (headers.fileName === undefined) {
      const claimed = ctx.session.claimKey(headers.fieldName, false);
      if (claimed.isErr) {
        throw claimed.error;
      }
      const begun = ctx.enforcer.beginField(headers);
      if (begun.isErr) {
        throw begun.error;
      }
      return openPart(headers, index, begun.value);
    }

    const decision = ctx.selector.evaluate(headers.fieldName, true);
    if (decision.isErr) {
      throw decision.error;
    }
    if (decision.value.action === "ignore") {
      const progress: BodyProgress = { ended: false, bytes: 0 };
      await exhaust(partBody(ctx.events, progress, null));
      ctx.log(`Ignored file for unknown field '${headers.fieldName}'`, {
        bytes: progress.bytes,
      });
      return null;
    }

    const claimed = ctx.session.claimKey(headers.fieldName, true);
    if (claimed.isErr) {
      throw claimed.error;
    }
    const begun = ctx.enforcer.beginFile(headers, decision.value.rule);
    if (begun.isErr) {
      throw begun.error;
    }
    return openPart(headers, index, begun.value);
  }

  async function finish(): Promise<void> {
    checkRequired(ctx.selector, ctx.rules);
    await ctx.events.return(undefined);
    ctx.session.complete();
    ctx.log("Parsed multipart request", {
      files: ctx.session.files.length,
      fields: ctx.session.entries.length,
      bytes: ctx.enforcer.totals().bodyBytes,
    });
  }

  async function passesFilter(meta: FileMeta): Promise<boolean> {
    const { fileFilter } = ctx.config;
    if (!fileFilter) {
      return true;
    }

    const verdict = await safeTry(() => fileFilter(meta));
    if (verdict.isErr) {
      throw new LimitError(
        "FILE_REJECTED",
        `file filter failed for field '${meta.fieldName}'`,
        { data: { field: meta.fieldName }, cause: verdict.error }
      );
    }
    return verdict.value;
  }

  const nextPart = async (): Promise<Result<FormPart | null, FormGateError>> => {
    if (failure) {
      return Err(failure);
    }
    if (ctx.session.state === "completed") {
      return Ok(null);
    }
    if (current?.reading) {
      throw new Error(`part '${current.handle.fieldName}' is still being read`);
    }

    try {
      if (current) {
        const previous = current;
        previous.taken = true;
        if (!previous.progress.ended) {
          await exhaust(readBody(previous));
        }
        current = null;
      }

      for (;;) {
        const next = await ctx.events.next();
        if (next.done) {
          throw new ParseError(
            "UNEXPECTED_EOF",
            "request body ended before the closing boundary"
          );
        }

        const event = next.value;
        if (event.type === "streamEnd") {
          await finish();
          return Ok(null);
        }
        if (event.type !== "partBegin") {
          throw new ParseError(
            "MALFORMED_BOUNDARY",
            `unexpected ${event.type} outside a part`
          );
        }

        const headers = parsePartHeaders(event.headers, {
          maxHeaderSize: ctx.limits.maxHeaderSize,
          maxFieldNameSize: ctx.limits.maxFieldNameSize,
        });
        if (headers.isErr) {
          throw headers.error;
        }

        const part = await admit(headers.value, ctx.session.nextIndex());
        if (part) {
          return Ok(part);
        }
      }
    } catch (caught) {
      return Err(await settle(caught, "nextPart"));
    }
  };

  const store = async (handle: FormPart): Promise<Result<TFile, FormGateError>> => {
    if (failure) {
      return Err(failure);
    }
    if (!handle.isFile) {
      throw new Error(`part '${handle.fieldName}' is not a file`);
    }
    const part = take(handle);

    try {
      const meta: FileMeta = {
        fieldName: handle.fieldName,
        originalName: handle.fileName,
        contentType: handle.contentType,
        index: handle.index,
      };
      if (!(await passesFilter(meta))) {
        throw new LimitError(
          "FILE_REJECTED",
          `file for field '${handle.fieldName}' was rejected`,
          { data: { field: handle.fieldName, fileName: handle.fileName } }
        );
      }

      const file = await ctx.config.storage.commit(meta, readBody(part), {
        maxSize: handle.maxSize,
        signal: ctx.signal,
      });
      // registered before the completeness check so an abort still cleans it up
      ctx.session.addFile(file);

      if (!part.progress.ended) {
        throw new StorageError(
          `storage returned before reading the whole file for field '${handle.fieldName}'`,
          { data: { field: handle.fieldName } }
        );
      }
      ctx.log(`Stored file for field '${handle.fieldName}'`, {
        fileName: file.fileName,
        size: file.size,
      });
      return Ok(file);
    } catch (caught) {
      return Err(await settle(caught, "store"));
    }
  };

  const cancel = async (reason?: unknown): Promise<void> => {
    if (failure || ctx.session.state === "completed") {
      return;
    }
    await settle(
      new ParseError("CANCELLED", "reader cancelled by caller", { cause: reason }),
      "cancel"
    );
  };

  return {
    get state() {
      return ctx.session.state;
    },
    nextPart,
    store,
    cancel,
    snapshot: () => ctx.session.toResult(),
  };
}
