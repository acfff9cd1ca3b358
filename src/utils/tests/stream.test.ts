import { describe, expect, it } from "vitest";
import { ParseError } from "@/errors";
import { raceAbort, toAsyncIterable } from "../stream";

async function collect(iterable: AsyncIterable<Uint8Array>): Promise<string> {
  const parts: string[] = [];
  for await (const chunk of iterable) {
    parts.push(Buffer.from(chunk).toString());
  }
  return parts.join("");
}

describe("toAsyncIterable", () => {
  it("passes async iterables through", async () => {
    async function* source(): AsyncGenerator<Uint8Array> {
      yield Buffer.from("ab");
      yield Buffer.from("c");
    }
    expect(await collect(toAsyncIterable(source()))).toBe("abc");
  });

  it("reads a web ReadableStream", async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("xy"));
        controller.enqueue(new TextEncoder().encode("z"));
        controller.close();
      },
    });
    expect(await collect(toAsyncIterable(stream))).toBe("xyz");
  });
});

describe("raceAbort", () => {
  it("resolves with the pending value without a signal", async () => {
    expect(await raceAbort(Promise.resolve(1), undefined)).toBe(1);
  });

  it("rejects at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort("stop");
    const error = await raceAbort(Promise.resolve(1), controller.signal).catch(
      (reason: unknown) => reason
    );
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.code).toBe("CANCELLED");
      expect(error.cause).toBe("stop");
    }
  });

  it("rejects when the signal fires first", async () => {
    const controller = new AbortController();
    const pending = new Promise<number>((resolve) => setTimeout(() => resolve(1), 50));
    const raced = raceAbort(pending, controller.signal);
    controller.abort();
    await expect(raced).rejects.toBeInstanceOf(ParseError);
  });

  it("passes through the pending rejection", async () => {
    const controller = new AbortController();
    const failure = new Error("read failed");
    await expect(raceAbort(Promise.reject(failure), controller.signal)).rejects.toBe(
      failure
    );
  });
});
