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
  toFormGateError,
} from "./errors";
