import { createHash } from "node:crypto";

const MAX_FILENAME_LENGTH = 255;
const MAX_KEPT_EXTENSION_LENGTH = 16;

// biome-ignore lint/suspicious/noControlCharactersInRegex: stripping control characters
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;
const UNSAFE_CHARS = /[/\\:*?"<>|]/g;
const DOT_RUNS = /\.{2,}/g;
const LEADING_JUNK = /^[. ]+/;
const TRAILING_JUNK = /[. ]+$/;
const WINDOWS_RESERVED = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])$/i;

function capLength(name: string): string {
  const chars = Array.from(name);
  if (chars.length <= MAX_FILENAME_LENGTH) {
    return name;
  }

  const dot = name.lastIndexOf(".");
  const extension = dot > 0 ? Array.from(name.slice(dot)) : [];
  if (extension.length === 0 || extension.length > MAX_KEPT_EXTENSION_LENGTH) {
    return chars.slice(0, MAX_FILENAME_LENGTH).join("").replace(TRAILING_JUNK, "");
  }

  const stem = chars
    .slice(0, MAX_FILENAME_LENGTH - extension.length)
    .join("")
    .replace(TRAILING_JUNK, "");
  return stem + extension.join("");
}

/**
 * Turns a client-supplied file name into one safe to use as a single path segment.
 * Pure: the same input always yields the same output.
 *
 * @example
 * sanitizeFilename("../../etc/passwd") // "_._etc_passwd"
 * sanitizeFilename("CON.txt") // "_CON.txt"
 */
export function sanitizeFilename(input: string): string {
  let name = input
    .replace(CONTROL_CHARS, "")
    .replace(UNSAFE_CHARS, "_")
    .replace(DOT_RUNS, ".")
    .replace(LEADING_JUNK, "")
    .replace(TRAILING_JUNK, "");

  const stem = name.split(".")[0] ?? "";
  if (WINDOWS_RESERVED.test(stem)) {
    name = `_${name}`;
  }

  name = capLength(name);

  if (name.length === 0) {
    const digest = createHash("sha256").update(input).digest("hex");
    return `unnamed-${digest.slice(0, 16)}`;
  }
  return name;
}
