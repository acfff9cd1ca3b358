import { describe, expect, it } from "vitest";
import { Err, Ok, safeTry } from "../result";

describe("Result", () => {
  it("builds an Ok", () => {
    expect(Ok(5)).toEqual({ isOk: true, value: 5, isErr: false, error: null });
  });

  it("builds an Err", () => {
    expect(Err("bad")).toEqual({ isOk: false, value: null, isErr: true, error: "bad" });
  });
});

describe("safeTry", () => {
  it("wraps a resolved value", async () => {
    expect(await safeTry(() => Promise.resolve("done"))).toEqual(Ok("done"));
  });

  it("captures a rejection", async () => {
    const failure = new Error("nope");
    const result = await safeTry(() => Promise.reject(failure));
    expect(result.isErr).toBe(true);
    expect(result.error).toBe(failure);
  });

  it("captures a synchronous throw", async () => {
    const result = await safeTry(() => {
      throw new Error("sync");
    });
    expect(result.error).toBeInstanceOf(Error);
  });
});
