/** Metadata of an accepted file part, known before its body is read */
export interface FileMeta {
  fieldName: string;
  /** Client-supplied file name; undefined when the part sent none */
  originalName: string | undefined;
  contentType: string;
  /** Ordinal position of the part within the request, starting at 0 */
  index: number;
}

/** Base shape of every committed file */
export interface StoredFile {
  readonly fieldName: string;
  readonly originalName: string | undefined;
  /** Sanitized or generated name, safe to use as a path segment */
  readonly fileName: string;
  readonly contentType: string;
  readonly size: number;
  /** Opaque backend handle */
  readonly storageKey: string;
}

export interface CommitOptions {
  /** Bytes the source may yield before the commit fails */
  maxSize: number;
  signal?: AbortSignal;
}

/**
 * Storage backend contract.
 * `commit` is all-or-nothing: when the source throws or the commit fails,
 * the partial artifact is removed before the error propagates.
 */
export interface StorageEngine<TFile extends StoredFile = StoredFile> {
  commit: (
    meta: FileMeta,
    source: AsyncIterable<Uint8Array>,
    options: CommitOptions
  ) => Promise<TFile>;
  /** Removes a file committed earlier in a session that later aborted */
  cleanup: (file: TFile) => Promise<void>;
  read: (file: TFile) => Promise<Buffer>;
}

/**
 * How a stored file is named.
 * - `"keep"`: the client name, sanitized
 * - `"random"`: a nanoid, independent of client input
 * - function: custom name from metadata, still sanitized
 */
export type FilenameStrategy = "keep" | "random" | ((meta: FileMeta) => string);
