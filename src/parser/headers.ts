import { ParseError } from "@/errors";
import { Err, Ok, type Result } from "@/utils";
import type { HeaderParserOptions, PartHeaders } from "./types";

const DEFAULT_FILE_CONTENT_TYPE = "application/octet-stream";
const DEFAULT_FIELD_CONTENT_TYPE = "text/plain";

const PARAM_REGEX = /;\s*([^\s=;]+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^\s;]*))/g;
const QUOTED_ESCAPE_REGEX = /\\(.)/g;
const HEADER_NAME_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const EXT_VALUE_REGEX = /^([^']*)'[^']*'(.*)$/;
const PERCENT_REGEX = /%([0-9A-Fa-f]{2})/g;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Splits a parameterized header value (Content-Type, Content-Disposition)
 * into its lowercased leading token and its parameters.
 * Parameter names are lowercased; quoted values have backslash escapes removed.
 * The first occurrence of a parameter wins.
 */
export function parseParameterizedValue(value: string): {
  token: string;
  params: Record<string, string>;
} {
  const separator = value.indexOf(";");
  const token = (separator === -1 ? value : value.slice(0, separator))
    .trim()
    .toLowerCase();
  const params = new Map<string, string>();

  if (separator !== -1) {
    for (const match of value.slice(separator).matchAll(PARAM_REGEX)) {
      const name = match[1]?.toLowerCase();
      if (!name || params.has(name)) {
        continue;
      }
      params.set(
        name,
        match[2] !== undefined
          ? match[2].replace(QUOTED_ESCAPE_REGEX, "$1")
          : (match[3] ?? "")
      );
    }
  }

  return { token, params: Object.fromEntries(params) };
}

/**
 * Decodes an RFC 5987 ext-value such as `UTF-8''na%C3%AFve.txt`.
 * Returns undefined when the value is malformed or the charset is unknown.
 */
export function decodeExtValue(value: string): string | undefined {
  const match = value.match(EXT_VALUE_REGEX);
  if (!match) {
    return undefined;
  }
  const charset = (match[1] ?? "").toLowerCase() || "utf-8";
  const bytes: number[] = [];
  const encoded = match[2] ?? "";

  let last = 0;
  for (const percent of encoded.matchAll(PERCENT_REGEX)) {
    const index = percent.index ?? 0;
    for (const char of Buffer.from(encoded.slice(last, index), "latin1")) {
      bytes.push(char);
    }
    bytes.push(Number.parseInt(percent[1] ?? "0", 16));
    last = index + percent[0].length;
  }
  for (const char of Buffer.from(encoded.slice(last), "latin1")) {
    bytes.push(char);
  }

  try {
    return new TextDecoder(charset, { fatal: true }).decode(
      Uint8Array.from(bytes)
    );
  } catch {
    // unknown charset label or bytes invalid for it
    return undefined;
  }
}

function invalidHeader(message: string, data?: Record<string, unknown>) {
  return Err(new ParseError("INVALID_HEADER", message, { data }));
}

/** Splits a header block into lowercased name/value pairs, folding continuation lines */
function splitHeaderLines(
  text: string
): Result<Array<[string, string]>, ParseError> {
  const headers: Array<[string, string]> = [];

  for (const line of text.split("\r\n")) {
    if (line.length === 0) {
      continue;
    }

    const previous = headers.at(-1);
    if ((line.startsWith(" ") || line.startsWith("\t")) && previous) {
      previous[1] = `${previous[1]} ${line.trim()}`;
      continue;
    }

    const colon = line.indexOf(":");
    if (colon === -1) {
      return invalidHeader("invalid part header line", { line });
    }

    const name = line.slice(0, colon).trim();
    if (!HEADER_NAME_REGEX.test(name)) {
      return invalidHeader("invalid part header name", { name });
    }
    headers.push([name.toLowerCase(), line.slice(colon + 1).trim()]);
  }

  return Ok(headers);
}

/**
 * Parses the header block of one part (the bytes before its blank line).
 * Extracts the field name, the optional file name and the content type.
 */
export function parsePartHeaders(
  raw: Uint8Array,
  options: HeaderParserOptions
): Result<PartHeaders, ParseError> {
  if (raw.byteLength > options.maxHeaderSize) {
    return Err(
      new ParseError(
        "HEADER_TOO_LARGE",
        `part header block exceeds ${options.maxHeaderSize} bytes`,
        { data: { maxHeaderSize: options.maxHeaderSize } }
      )
    );
  }

  let text: string;
  try {
    text = utf8.decode(raw);
  } catch (error) {
    return Err(
      new ParseError("INVALID_HEADER", "part headers must be UTF-8", {
        cause: error,
      })
    );
  }

  const lines = splitHeaderLines(text);
  if (lines.isErr) {
    return lines;
  }

  const disposition = lines.value.find(
    ([name]) => name === "content-disposition"
  );
  if (!disposition) {
    return Err(
      new ParseError(
        "MISSING_FIELD_NAME",
        "part is missing a Content-Disposition header"
      )
    );
  }

  const { params } = parseParameterizedValue(disposition[1]);
  const fieldName = params.name;
  if (fieldName === undefined) {
    return Err(
      new ParseError(
        "MISSING_FIELD_NAME",
        "Content-Disposition has no name attribute"
      )
    );
  }
  if (fieldName.length > options.maxFieldNameSize) {
    return invalidHeader(
      `field name exceeds ${options.maxFieldNameSize} characters`,
      { maxFieldNameSize: options.maxFieldNameSize }
    );
  }

  // either filename parameter makes this a file part, even when it cannot be decoded
  const extParam = params["filename*"];
  const fileName =
    extParam === undefined
      ? params.filename
      : (decodeExtValue(extParam) ?? params.filename ?? "");

  const contentTypeHeader = lines.value.find(
    ([name]) => name === "content-type"
  );
  const contentType =
    contentTypeHeader && contentTypeHeader[1].length > 0
      ? contentTypeHeader[1]
      : fileName === undefined
        ? DEFAULT_FIELD_CONTENT_TYPE
        : DEFAULT_FILE_CONTENT_TYPE;

  return Ok({
    fieldName,
    ...(fileName === undefined ? {} : { fileName }),
    contentType,
    raw: lines.value,
  });
}
