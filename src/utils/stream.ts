import { ParseError } from "@/errors";

/** Body shapes accepted by a parse session */
export type BodyInput = AsyncIterable<Uint8Array> | ReadableStream<Uint8Array>;

function isAsyncIterable(value: BodyInput): value is AsyncIterable<Uint8Array> {
  return Symbol.asyncIterator in value;
}

/**
 * Reads a web ReadableStream through its reader.
 * Returning early (break/return/throw in the consumer) cancels the stream.
 */
async function* readStream(
  stream: ReadableStream<Uint8Array>
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = stream.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/** Normalizes any supported body into an async iterable of byte chunks */
export function toAsyncIterable(body: BodyInput): AsyncIterable<Uint8Array> {
  return isAsyncIterable(body) ? body : readStream(body);
}

/**
 * Races a pending operation against an AbortSignal.
 * Rejects with a CANCELLED ParseError as soon as the signal fires.
 */
export function raceAbort<T>(
  pending: Promise<T>,
  signal: AbortSignal | undefined
): Promise<T> {
  if (!signal) {
    return pending;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelledError(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    // settling after an abort is a no-op, but a late rejection stays handled
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function cancelledError(signal: AbortSignal): ParseError {
  return new ParseError("CANCELLED", "parse cancelled by caller", {
    cause: signal.reason,
  });
}
