import { nanoid } from "nanoid";
import { LimitError } from "@/errors";
import { cancelledError } from "@/utils";
import { resolveFilename } from "./resolve-filename";
import type {
  CommitOptions,
  FileMeta,
  FilenameStrategy,
  StorageEngine,
  StoredFile,
} from "./types";

export interface MemoryFile extends StoredFile {
  readonly buffer: Buffer;
}

export interface MemoryStorageOptions {
  /** Defaults to "keep" */
  filename?: FilenameStrategy;
}

/**
 * Keeps committed files in memory.
 * The output carries its buffer by reference, so `cleanup` has nothing to release.
 */
export class MemoryStorage implements StorageEngine<MemoryFile> {
  private readonly filename: FilenameStrategy;

  constructor(options: MemoryStorageOptions = {}) {
    this.filename = options.filename ?? "keep";
  }

  async commit(
    meta: FileMeta,
    source: AsyncIterable<Uint8Array>,
    options: CommitOptions
  ): Promise<MemoryFile> {
    const chunks: Buffer[] = [];
    let size = 0;

    for await (const chunk of source) {
      if (options.signal?.aborted) {
        throw cancelledError(options.signal);
      }
      size += chunk.byteLength;
      if (size > options.maxSize) {
        throw new LimitError(
          "FILE_TOO_LARGE",
          `file for field '${meta.fieldName}' exceeds ${options.maxSize} bytes`,
          { data: { field: meta.fieldName, limit: "maxFileSize", max: options.maxSize } }
        );
      }
      chunks.push(Buffer.from(chunk));
    }

    return Object.freeze({
      fieldName: meta.fieldName,
      originalName: meta.originalName,
      fileName: resolveFilename(this.filename, meta),
      contentType: meta.contentType,
      size,
      storageKey: nanoid(),
      buffer: Buffer.concat(chunks, size),
    });
  }

  cleanup(_file: MemoryFile): Promise<void> {
    return Promise.resolve();
  }

  read(file: MemoryFile): Promise<Buffer> {
    return Promise.resolve(file.buffer);
  }
}
