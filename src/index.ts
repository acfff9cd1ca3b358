// Gate factory — the main entry point
export { createFormGate } from "./engine/create-form-gate";
// Gate types — configuration, parse input and result shapes
export type {
  FieldEntry,
  FileFilter,
  FormGate,
  FormGateConfig,
  FormPart,
  HeadersInput,
  MixedKeysPolicy,
  MultipartReader,
  ParseOptions,
  ParseResult,
} from "./engine/types";
export type { SessionState } from "./engine/session";

// Errors — taxonomy returned by parse and thrown at construction
export {
  ConfigError,
  type ConfigErrorCode,
  type ErrorCategory,
  type ErrorCode,
  FormGateError,
  LimitError,
  type LimitErrorCode,
  ParseError,
  type ParseErrorCode,
  StorageError,
  type StorageErrorCode,
} from "./errors";

// Limits — defaults and MIME matching
export {
  DEFAULT_LIMITS,
  matchesMimeType,
  type ResolvedLimits,
  type UploadAllowlist,
  type UploadLimits,
} from "./limits";

// Field rules
export type {
  FieldRule,
  RuleOptions,
  SelectedField,
  UnknownFieldPolicy,
} from "./selector";

// Storage backends and filename handling
export {
  type CommitOptions,
  type DiskFile,
  DiskStorage,
  type DiskStorageOptions,
  type FileMeta,
  type FilenameStrategy,
  type MemoryFile,
  MemoryStorage,
  type MemoryStorageOptions,
  sanitizeFilename,
  type StorageEngine,
  type StoredFile,
} from "./storage";

// Logging — structured pino logger with log ids
export { createLogger, type FormGateLogger, type LoggerConfig } from "./logging";

// Result helpers
export { Err, Ok, type Result, safeTry } from "./utils";
export type { BodyInput } from "./utils";
