import type { LimitError } from "@/errors";
import type { PartHeaders } from "@/parser";
import type { CompiledRule } from "@/selector";
import type { Result } from "@/utils";

/** Upload limits. Every bound is inclusive. */
export interface UploadLimits {
  /** Largest accepted file part body, in bytes */
  maxFileSize?: number;
  /** Largest accepted plain field value, in bytes */
  maxFieldSize?: number;
  maxFiles?: number;
  maxFields?: number;
  /** Largest raw request body, boundaries and headers included */
  maxBodySize?: number;
  /** Largest header block of a single part */
  maxHeaderSize?: number;
  maxFieldNameSize?: number;
}

export type ResolvedLimits = Readonly<Required<UploadLimits>>;

/** Allowlist for MIME types and file extensions */
export interface UploadAllowlist {
  /** Literal types, `type/*` wildcards, or `*` / `*` + `/*` for anything */
  mimeTypes?: string[];
  /** Extensions including the dot, compared case-insensitively */
  extensions?: string[];
}

export interface LimitTotals {
  bodyBytes: number;
  files: number;
  fields: number;
}

/** Per-session counters; create one per parse */
export interface LimitEnforcer {
  /** Counts raw input bytes against maxBodySize, before they are scanned */
  observeChunk: (byteLength: number) => Result<void, LimitError>;
  /**
   * Opens a file part: count, MIME and extension checks.
   * @returns The size limit that applies to this part
   */
  beginFile: (
    part: PartHeaders,
    rule: CompiledRule | null
  ) => Result<number, LimitError>;
  /** Opens a plain field part. @returns maxFieldSize */
  beginField: (part: PartHeaders) => Result<number, LimitError>;
  /** Counts body bytes of the open part against its limit */
  observePartData: (byteLength: number) => Result<void, LimitError>;
  totals: () => LimitTotals;
}
