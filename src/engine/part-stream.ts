import { ParseError } from "@/errors";
import type { LimitEnforcer } from "@/limits";
import type { BoundaryScanner, ScanEvent } from "@/parser";
import {
  type BodyInput,
  cancelledError,
  type DiagnosticsLog,
  raceAbort,
  safeTry,
  toAsyncIterable,
} from "@/utils";
import type { HeadersInput } from "./types";

/** Tracks whether a part body was read up to its closing boundary */
export interface BodyProgress {
  ended: boolean;
  bytes: number;
}

export function getContentType(headers: HeadersInput): string | null {
  if (headers instanceof Headers) {
    return headers.get("content-type");
  }
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === "content-type") {
      return (Array.isArray(value) ? value[0] : value) ?? null;
    }
  }
  return null;
}

/**
 * Pulls raw chunks, counts them against maxBodySize before scanning,
 * and yields scanner events in stream order.
 */
export async function* scanEvents(
  body: BodyInput,
  scanner: BoundaryScanner,
  enforcer: LimitEnforcer,
  signal: AbortSignal | undefined,
  log: DiagnosticsLog
): AsyncGenerator<ScanEvent, void, undefined> {
  const iterator = toAsyncIterable(body)[Symbol.asyncIterator]();
  let pendingRead = false;

  try {
    for (;;) {
      if (signal?.aborted) {
        throw cancelledError(signal);
      }
      let next: IteratorResult<Uint8Array>;
      pendingRead = true;
      try {
        next = await raceAbort(iterator.next(), signal);
        pendingRead = false;
      } catch (error) {
        if (error instanceof ParseError && error.code === "CANCELLED") {
          throw error;
        }
        pendingRead = false;
        throw new ParseError("STREAM_ERROR", "request body stream failed", {
          cause: error,
        });
      }

      if (next.done) {
        break;
      }

      const observed = enforcer.observeChunk(next.value.byteLength);
      if (observed.isErr) {
        throw observed.error;
      }

      const events = scanner.feed(next.value);
      if (events.isErr) {
        throw events.error;
      }
      yield* events.value;

      if (scanner.isDone) {
        return;
      }
    }

    const ended = scanner.end();
    if (ended.isErr) {
      throw ended.error;
    }
  } finally {
    // closing the source is best effort and never replaces the outcome
    const closing = safeTry(() => iterator.return?.()).then((closed) => {
      if (closed.isErr) {
        log("Failed to close request body", closed.error);
      }
    });
    // a read still in flight after cancellation closes the source once it settles
    if (!pendingRead) {
      await closing;
    }
  }
}

/**
 * Yields the body chunks of the current part until its closing boundary,
 * enforcing the part limit before each chunk is handed on.
 */
export async function* partBody(
  events: AsyncGenerator<ScanEvent, void, undefined>,
  progress: BodyProgress,
  observe: LimitEnforcer["observePartData"] | null
): AsyncGenerator<Uint8Array, void, undefined> {
  for (;;) {
    const next = await events.next();
    if (next.done) {
      throw new ParseError("UNEXPECTED_EOF", "request body ended inside a part");
    }

    const event = next.value;
    if (event.type === "partEnd") {
      progress.ended = true;
      return;
    }
    if (event.type !== "partData") {
      throw new ParseError(
        "MALFORMED_BOUNDARY",
        `unexpected ${event.type} inside a part body`
      );
    }

    if (observe) {
      const observed = observe(event.data.byteLength);
      if (observed.isErr) {
        throw observed.error;
      }
    }
    progress.bytes += event.data.byteLength;
    yield event.data;
  }
}
