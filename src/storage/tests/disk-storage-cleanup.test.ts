import { mkdtempSync, readdirSync, rmSync } from "node:fs";
import { rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { LimitError, StorageError } from "@/errors";
import { DiskStorage } from "../disk-storage";
import type { FileMeta } from "../types";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

const META: FileMeta = {
  fieldName: "doc",
  originalName: "notes.txt",
  contentType: "text/plain",
  index: 0,
};

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "formgate-disk-rm-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("DiskStorage - failed partial file removal", () => {
  it("keeps the limit error and records the removal failure", async () => {
    const busy = new Error("EBUSY: rm failed");
    vi.mocked(rm).mockRejectedValueOnce(busy);
    const storage = new DiskStorage({ destination: dir });

    async function* source(): AsyncGenerator<Uint8Array> {
      yield Buffer.from("abc");
      yield Buffer.from("def");
    }

    const error = await storage
      .commit(META, source(), { maxSize: 4 })
      .then(() => undefined, (caught: unknown) => caught);

    expect(error).toBeInstanceOf(LimitError);
    if (error instanceof LimitError) {
      expect(error.code).toBe("FILE_TOO_LARGE");
      expect(error.cleanupFailures).toEqual([busy]);
    }
    expect(readdirSync(dir)).toHaveLength(1);
  });

  it("wraps a foreign source error as a storage failure", async () => {
    const busy = new Error("EBUSY: rm failed");
    const broken = new Error("source broke");
    vi.mocked(rm).mockRejectedValueOnce(busy);
    const storage = new DiskStorage({ destination: dir });

    async function* source(): AsyncGenerator<Uint8Array> {
      yield Buffer.from("ab");
      throw broken;
    }

    const error = await storage
      .commit(META, source(), { maxSize: 10 })
      .then(() => undefined, (caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    if (error instanceof StorageError) {
      expect(error.message).toBe("failed to write file for field 'doc'");
      expect(error.cause).toBe(broken);
      expect(error.cleanupFailures).toEqual([busy]);
    }
  });

  it("rethrows the original error when removal succeeds", async () => {
    const storage = new DiskStorage({ destination: dir });

    async function* source(): AsyncGenerator<Uint8Array> {
      yield Buffer.from("abcdef");
    }

    await expect(storage.commit(META, source(), { maxSize: 4 })).rejects.toMatchObject({
      code: "FILE_TOO_LARGE",
      cleanupFailures: [],
    });
    expect(readdirSync(dir)).toEqual([]);
  });
});
