import type { FormGateError } from "@/errors";
import type { UploadLimits } from "@/limits";
import type { FormGateLogger } from "@/logging";
import type { FieldRule, UnknownFieldPolicy } from "@/selector";
import type { FileMeta, StorageEngine, StoredFile } from "@/storage";
import type { BodyInput, Result } from "@/utils";
import type { SessionState } from "./session";

/** Request headers as a fetch `Headers` object or a Node-style record */
export type HeadersInput =
  | Headers
  | Record<string, string | string[] | undefined>;

/** Runs after selector and limit checks, before storage; false rejects the file */
export type FileFilter = (meta: FileMeta) => boolean | Promise<boolean>;

export type MixedKeysPolicy = "allow" | "reject";

export interface FormGateConfig<TFile extends StoredFile = StoredFile> {
  storage: StorageEngine<TFile>;
  /** File field rules; an empty list accepts files under any name */
  rules?: FieldRule[];
  limits?: UploadLimits;
  /** Global MIME allowlist; every type is allowed when omitted */
  allowedMimeTypes?: string[];
  /** Global extension allowlist, e.g. [".png", ".pdf"] */
  allowedExtensions?: string[];
  /** Defaults to "reject" */
  unknownFieldPolicy?: UnknownFieldPolicy;
  /** Whether one name may carry both files and plain values. Defaults to "allow" */
  mixedKeys?: MixedKeysPolicy;
  fileFilter?: FileFilter;
  logger?: FormGateLogger;
  diagnostics?: boolean;
}

export interface FieldEntry {
  name: string;
  value: string;
}

export interface ParseResult<TFile extends StoredFile = StoredFile> {
  /** Committed files in part order */
  files: TFile[];
  /** Plain fields; a repeated name maps to its values in order */
  fields: Record<string, string | string[]>;
  /** Plain fields in part order */
  entries: FieldEntry[];
}

export interface ParseOptions {
  signal?: AbortSignal;
}

/**
 * One part handed out by a MultipartReader. Its body can be read once,
 * and only until the next part is requested.
 */
export interface FormPart {
  readonly fieldName: string;
  /** Client-supplied file name; present (possibly empty) only for file parts */
  readonly fileName: string | undefined;
  readonly contentType: string;
  /** Ordinal of the part in the request, starting at 0 */
  readonly index: number;
  readonly isFile: boolean;
  /** Byte limit for this part's body */
  readonly maxSize: number;
  /** Reads the whole body and decodes it as UTF-8 */
  text: () => Promise<Result<string, FormGateError>>;
  bytes: () => Promise<Result<Buffer, FormGateError>>;
  /**
   * Streams the body. A failure aborts the reader and is thrown as the
   * FormGateError that the reader reports from then on.
   */
  stream: () => AsyncGenerator<Uint8Array, void, undefined>;
}

/**
 * Pull-based access to one request. Parts come back one at a time with
 * rules and limits already applied; file parts are committed with `store`.
 * Any failure aborts the reader, removes every stored file and is returned
 * again by later calls.
 */
export interface MultipartReader<TFile extends StoredFile = StoredFile> {
  readonly state: SessionState;
  /**
   * Skips whatever is left of the previous part and opens the next one.
   * Resolves to null once the closing boundary was read and every required
   * field arrived.
   */
  nextPart: () => Promise<Result<FormPart | null, FormGateError>>;
  /** Runs the file filter and commits the part body to storage */
  store: (part: FormPart) => Promise<Result<TFile, FormGateError>>;
  /** Aborts an unfinished reader and removes the files stored so far */
  cancel: (reason?: unknown) => Promise<void>;
  /** Files stored and plain fields read so far */
  snapshot: () => ParseResult<TFile>;
}

export interface FormGate<TFile extends StoredFile = StoredFile> {
  readonly config: Readonly<FormGateConfig<TFile>>;
  /** Opens a request for part-by-part reading */
  open: (
    headers: HeadersInput,
    body: BodyInput | null,
    options?: ParseOptions
  ) => Result<MultipartReader<TFile>, FormGateError>;
  /** Parses one request. Request errors come back as Err, never thrown */
  parse: (
    headers: HeadersInput,
    body: BodyInput | null,
    options?: ParseOptions
  ) => Promise<Result<ParseResult<TFile>, FormGateError>>;
}
