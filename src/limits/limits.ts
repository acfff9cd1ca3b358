import { LimitError } from "@/errors";
import type { PartHeaders } from "@/parser";
import { Err, Ok } from "@/utils";
import type {
  LimitEnforcer,
  ResolvedLimits,
  UploadAllowlist,
  UploadLimits,
} from "./types";

// --- Default limits ---

export const DEFAULT_LIMITS: ResolvedLimits = Object.freeze({
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFieldSize: 1024 * 1024, // 1MB
  maxFiles: 10,
  maxFields: 100,
  maxBodySize: 20 * 1024 * 1024, // 20MB
  maxHeaderSize: 16 * 1024, // 16KB
  maxFieldNameSize: 200,
});

export function resolveLimits(limits: UploadLimits = {}): ResolvedLimits {
  return Object.freeze({
    maxFileSize: limits.maxFileSize ?? DEFAULT_LIMITS.maxFileSize,
    maxFieldSize: limits.maxFieldSize ?? DEFAULT_LIMITS.maxFieldSize,
    maxFiles: limits.maxFiles ?? DEFAULT_LIMITS.maxFiles,
    maxFields: limits.maxFields ?? DEFAULT_LIMITS.maxFields,
    maxBodySize: limits.maxBodySize ?? DEFAULT_LIMITS.maxBodySize,
    maxHeaderSize: limits.maxHeaderSize ?? DEFAULT_LIMITS.maxHeaderSize,
    maxFieldNameSize: limits.maxFieldNameSize ?? DEFAULT_LIMITS.maxFieldNameSize,
  });
}

/** Lowercased `type/subtype` of a Content-Type value, parameters dropped */
export function mimeEssence(contentType: string): string {
  return (contentType.split(";")[0] ?? "").trim().toLowerCase();
}

/**
 * Checks a content type against an allowlist.
 * Patterns are literal types, `type/*` wildcards, or `*` and `*` + `/*`.
 */
export function matchesMimeType(
  contentType: string,
  patterns: readonly string[]
): boolean {
  const essence = mimeEssence(contentType);
  return patterns.some((raw) => {
    const pattern = raw.trim().toLowerCase();
    if (pattern === "*" || pattern === "*/*") {
      return true;
    }
    if (pattern.endsWith("/*")) {
      return essence.startsWith(pattern.slice(0, -1));
    }
    return essence === pattern;
  });
}

/** Extension of a client file name including the dot, lowercased; "" when none */
export function fileExtension(fileName: string): string {
  const base = fileName.split(/[\\/]/).at(-1) ?? "";
  const dot = base.lastIndexOf(".");
  return dot <= 0 ? "" : base.slice(dot).toLowerCase();
}

/**
 * Creates the per-session limit enforcer.
 * Counts are 1-indexed: the Nth file is rejected when N > maxFiles.
 */
export function createLimitEnforcer(
  limits: ResolvedLimits,
  allow: UploadAllowlist = {}
): LimitEnforcer {
  let bodyBytes = 0;
  let files = 0;
  let fields = 0;
  let current: { field: string; isFile: boolean; limit: number; bytes: number } | null =
    null;

  const allowedExtensions = allow.extensions?.map((ext) => ext.toLowerCase());

  return {
    observeChunk: (byteLength) => {
      if (bodyBytes + byteLength > limits.maxBodySize) {
        return Err(
          new LimitError(
            "BODY_TOO_LARGE",
            `request body exceeds ${limits.maxBodySize} bytes`,
            { data: { limit: "maxBodySize", max: limits.maxBodySize } }
          )
        );
      }
      bodyBytes += byteLength;
      return Ok(undefined);
    },

    beginFile: (part, rule) => {
      files += 1;
      if (files > limits.maxFiles) {
        return Err(
          new LimitError("TOO_MANY_FILES", "upload limit exceeded", {
            data: { limit: "maxFiles", max: limits.maxFiles, received: files },
          })
        );
      }

      const mimeTypes = rule?.allowedMimeTypes ?? allow.mimeTypes;
      if (mimeTypes && !matchesMimeType(part.contentType, mimeTypes)) {
        return Err(
          new LimitError(
            "DISALLOWED_MIME_TYPE",
            `file type '${mimeEssence(part.contentType)}' not allowed`,
            {
              data: {
                field: part.fieldName,
                mime: mimeEssence(part.contentType),
                allowed: [...mimeTypes],
              },
            }
          )
        );
      }

      if (
        allowedExtensions &&
        !allowedExtensions.includes(fileExtension(part.fileName ?? ""))
      ) {
        return Err(
          new LimitError(
            "DISALLOWED_EXTENSION",
            "file extension not allowed",
            {
              data: {
                field: part.fieldName,
                fileName: part.fileName,
                allowed: allowedExtensions,
              },
            }
          )
        );
      }

      const limit = rule?.maxFileSize ?? limits.maxFileSize;
      current = { field: part.fieldName, isFile: true, limit, bytes: 0 };
      return Ok(limit);
    },

    beginField: (part) => {
      fields += 1;
      if (fields > limits.maxFields) {
        return Err(
          new LimitError("TOO_MANY_FIELDS", "field limit exceeded", {
            data: { limit: "maxFields", max: limits.maxFields, received: fields },
          })
        );
      }
      current = {
        field: part.fieldName,
        isFile: false,
        limit: limits.maxFieldSize,
        bytes: 0,
      };
      return Ok(limits.maxFieldSize);
    },

    observePartData: (byteLength) => {
      if (!current) {
        return Ok(undefined);
      }
      current.bytes += byteLength;
      if (current.bytes <= current.limit) {
        return Ok(undefined);
      }
      return Err(
        current.isFile
          ? new LimitError(
              "FILE_TOO_LARGE",
              `file for field '${current.field}' exceeds ${current.limit} bytes`,
              {
                data: {
                  field: current.field,
                  limit: "maxFileSize",
                  max: current.limit,
                },
              }
            )
          : new LimitError(
              "FIELD_TOO_LARGE",
              `field '${current.field}' exceeds ${current.limit} bytes`,
              {
                data: {
                  field: current.field,
                  limit: "maxFieldSize",
                  max: current.limit,
                },
              }
            )
      );
    },

    totals: () => ({ bodyBytes, files, fields }),
  };
}
