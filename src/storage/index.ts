export {
  DiskStorage,
  type DiskFile,
  type DiskStorageOptions,
} from "./disk-storage";
export {
  MemoryStorage,
  type MemoryFile,
  type MemoryStorageOptions,
} from "./memory-storage";
export { resolveFilename } from "./resolve-filename";
export { sanitizeFilename } from "./sanitize-filename";
export type {
  CommitOptions,
  FileMeta,
  FilenameStrategy,
  StorageEngine,
  StoredFile,
} from "./types";
