export { createFormGate } from "./create-form-gate";
export { ParseSession, type SessionState } from "./session";
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
} from "./types";
