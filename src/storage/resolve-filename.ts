import { nanoid } from "nanoid";
import { sanitizeFilename } from "./sanitize-filename";
import type { FileMeta, FilenameStrategy } from "./types";

/** Applies a FilenameStrategy; client-influenced names are always sanitized */
export function resolveFilename(
  strategy: FilenameStrategy,
  meta: FileMeta
): string {
  if (strategy === "random") {
    return nanoid();
  }
  if (strategy === "keep") {
    return sanitizeFilename(meta.originalName ?? "");
  }
  return sanitizeFilename(strategy(meta));
}
