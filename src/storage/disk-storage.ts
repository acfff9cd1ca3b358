import { accessSync, constants, mkdirSync, statSync } from "node:fs";
import { type FileHandle, open, readFile, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { nanoid } from "nanoid";
import { ConfigError, FormGateError, LimitError, StorageError } from "@/errors";
import { cancelledError, safeTry } from "@/utils";
import { resolveFilename } from "./resolve-filename";
import type {
  CommitOptions,
  FileMeta,
  FilenameStrategy,
  StorageEngine,
  StoredFile,
} from "./types";

const MAX_OPEN_ATTEMPTS = 5;

export interface DiskFile extends StoredFile {
  /** Absolute path of the written file */
  readonly path: string;
  readonly destination: string;
}

export interface DiskStorageOptions {
  destination: string;
  /** Defaults to "random" */
  filename?: FilenameStrategy;
  /** Create the destination directory when missing. Defaults to true */
  createDestination?: boolean;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Inserts a suffix before the extension: "a.txt" -> "a-x1y2.txt" */
function withSuffix(fileName: string, suffix: string): string {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0) {
    return `${fileName}-${suffix}`;
  }
  return `${fileName.slice(0, dot)}-${suffix}${fileName.slice(dot)}`;
}

/**
 * Streams committed files to a directory on disk.
 * Targets are opened exclusively; an existing file is never overwritten or removed.
 */
export class DiskStorage implements StorageEngine<DiskFile> {
  readonly destination: string;
  private readonly filename: FilenameStrategy;

  /** @throws {ConfigError} UNWRITABLE_DESTINATION when the directory cannot be used */
  constructor(options: DiskStorageOptions) {
    this.destination = resolve(options.destination);
    this.filename = options.filename ?? "random";

    try {
      if (options.createDestination ?? true) {
        mkdirSync(this.destination, { recursive: true });
      }
      if (!statSync(this.destination).isDirectory()) {
        throw new Error("not a directory");
      }
      accessSync(this.destination, constants.W_OK);
    } catch (error) {
      throw new ConfigError(
        "UNWRITABLE_DESTINATION",
        `upload destination '${this.destination}' is not a writable directory`,
        { data: { destination: this.destination }, cause: error }
      );
    }
  }

  async commit(
    meta: FileMeta,
    source: AsyncIterable<Uint8Array>,
    options: CommitOptions
  ): Promise<DiskFile> {
    const { handle, fileName } = await this.openExclusive(
      resolveFilename(this.filename, meta)
    );
    const path = join(this.destination, fileName);
    let size = 0;

    async function* counted(): AsyncGenerator<Uint8Array, void, undefined> {
      for await (const chunk of source) {
        if (options.signal?.aborted) {
          throw cancelledError(options.signal);
        }
        size += chunk.byteLength;
        if (size > options.maxSize) {
          throw new LimitError(
            "FILE_TOO_LARGE",
            `file for field '${meta.fieldName}' exceeds ${options.maxSize} bytes`,
            {
              data: {
                field: meta.fieldName,
                limit: "maxFileSize",
                max: options.maxSize,
              },
            }
          );
        }
        yield chunk;
      }
    }

    try {
      // the write stream closes the handle once it finishes or is destroyed
      await pipeline(Readable.from(counted()), handle.createWriteStream());
    } catch (error) {
      const removed = await safeTry(() => rm(path, { force: true }));
      if (removed.isOk) {
        throw error;
      }
      const failure =
        error instanceof FormGateError
          ? error
          : new StorageError(
              `failed to write file for field '${meta.fieldName}'`,
              { data: { field: meta.fieldName }, cause: error }
            );
      failure.cleanupFailures.push(removed.error);
      throw failure;
    }

    return Object.freeze({
      fieldName: meta.fieldName,
      originalName: meta.originalName,
      fileName,
      contentType: meta.contentType,
      size,
      storageKey: fileName,
      path,
      destination: this.destination,
    });
  }

  async cleanup(file: DiskFile): Promise<void> {
    await rm(file.path, { force: true });
  }

  read(file: DiskFile): Promise<Buffer> {
    return readFile(file.path);
  }

  private async openExclusive(
    baseName: string
  ): Promise<{ handle: FileHandle; fileName: string }> {
    for (let attempt = 0; attempt < MAX_OPEN_ATTEMPTS; attempt++) {
      const fileName = attempt === 0 ? baseName : withSuffix(baseName, nanoid(8));
      try {
        const handle = await open(join(this.destination, fileName), "wx");
        return { handle, fileName };
      } catch (error) {
        if (!isErrnoCode(error, "EEXIST")) {
          throw error;
        }
      }
    }

    throw new StorageError(
      `could not find a free file name for '${baseName}' after ${MAX_OPEN_ATTEMPTS} attempts`,
      { data: { destination: this.destination, fileName: baseName } }
    );
  }
}
