/**
 * Error taxonomy for formgate.
 * Every failure surfaced by a parse session is a FormGateError subclass carrying
 * a stable `code`, a `category` and the HTTP status an adapter should answer with.
 */

export type ErrorCategory = "config" | "parse" | "limit" | "storage";

export type ConfigErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_RULES"
  | "UNWRITABLE_DESTINATION";

export type ParseErrorCode =
  | "INVALID_CONTENT_TYPE"
  | "MISSING_BOUNDARY"
  | "INVALID_BOUNDARY"
  | "MALFORMED_BOUNDARY"
  | "UNEXPECTED_EOF"
  | "HEADER_TOO_LARGE"
  | "INVALID_HEADER"
  | "MISSING_FIELD_NAME"
  | "STREAM_ERROR"
  | "CANCELLED";

export type LimitErrorCode =
  | "FILE_TOO_LARGE"
  | "FIELD_TOO_LARGE"
  | "BODY_TOO_LARGE"
  | "TOO_MANY_FILES"
  | "TOO_MANY_FIELDS"
  | "UNEXPECTED_FIELD"
  | "MISSING_FIELD"
  | "MIXED_KEYS"
  | "DISALLOWED_MIME_TYPE"
  | "DISALLOWED_EXTENSION"
  | "FILE_REJECTED";

export type StorageErrorCode = "STORAGE_FAILURE";

export type ErrorCode =
  | ConfigErrorCode
  | ParseErrorCode
  | LimitErrorCode
  | StorageErrorCode;

interface FormGateErrorOptions {
  data?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class FormGateError extends Error {
  abstract readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly data: Record<string, unknown>;
  /** Log id assigned when the error was reported through a logger */
  logId?: string;
  /** Cleanup failures recorded while aborting the session that raised this error */
  cleanupFailures: unknown[] = [];

  constructor(
    code: ErrorCode,
    message: string,
    options: FormGateErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.data = options.data ?? {};
  }

  abstract get statusCode(): number;

  /** Serializable shape used by adapters and logs */
  toJSON(): Record<string, unknown> {
    return {
      error_category: this.category,
      code: this.code,
      message: this.message,
      ...this.data,
    };
  }
}

export class ConfigError extends FormGateError {
  readonly category = "config";
  declare readonly code: ConfigErrorCode;

  constructor(
    code: ConfigErrorCode,
    message: string,
    options?: FormGateErrorOptions
  ) {
    super(code, message, options);
  }

  get statusCode(): number {
    return 500;
  }
}

export class ParseError extends FormGateError {
  readonly category = "parse";
  declare readonly code: ParseErrorCode;

  constructor(
    code: ParseErrorCode,
    message: string,
    options?: FormGateErrorOptions
  ) {
    super(code, message, options);
  }

  get statusCode(): number {
    return 400;
  }
}

const LIMIT_STATUS: Record<LimitErrorCode, number> = {
  FILE_TOO_LARGE: 413,
  FIELD_TOO_LARGE: 413,
  BODY_TOO_LARGE: 413,
  TOO_MANY_FILES: 400,
  TOO_MANY_FIELDS: 400,
  UNEXPECTED_FIELD: 400,
  MISSING_FIELD: 400,
  MIXED_KEYS: 400,
  DISALLOWED_MIME_TYPE: 415,
  DISALLOWED_EXTENSION: 415,
  FILE_REJECTED: 400,
};

export class LimitError extends FormGateError {
  readonly category = "limit";
  declare readonly code: LimitErrorCode;

  constructor(
    code: LimitErrorCode,
    message: string,
    options?: FormGateErrorOptions
  ) {
    super(code, message, options);
  }

  get statusCode(): number {
    return LIMIT_STATUS[this.code];
  }
}

export class StorageError extends FormGateError {
  readonly category = "storage";
  declare readonly code: StorageErrorCode;

  constructor(message: string, options?: FormGateErrorOptions) {
    super("STORAGE_FAILURE", message, options);
  }

  get statusCode(): number {
    return 500;
  }
}

/**
 * Normalizes anything thrown inside a session into a FormGateError.
 * Errors that are not already part of the taxonomy came from a storage backend.
 */
export function toFormGateError(error: unknown): FormGateError {
  if (error instanceof FormGateError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`storage backend failed: ${message}`, {
    cause: error,
  });
}
