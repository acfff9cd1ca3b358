import { ParseError } from "@/errors";
import { Err, Ok, type Result } from "@/utils";
import { parseParameterizedValue } from "./headers";

const MULTIPART_FORM_DATA = "multipart/form-data";
const MAX_BOUNDARY_LENGTH = 70;

// RFC 2046 bchars
const BOUNDARY_CHARS_REGEX = /^[0-9A-Za-z'()+_,\-./:=? ]+$/;

/** Validates a boundary token against RFC 2046 length and character rules */
export function validateBoundary(boundary: string): Result<string, ParseError> {
  if (boundary.length === 0) {
    return Err(
      new ParseError("INVALID_BOUNDARY", "multipart boundary cannot be empty")
    );
  }

  if (boundary.length > MAX_BOUNDARY_LENGTH) {
    return Err(
      new ParseError(
        "INVALID_BOUNDARY",
        `multipart boundary cannot exceed ${MAX_BOUNDARY_LENGTH} characters`,
        { data: { length: boundary.length } }
      )
    );
  }

  if (boundary.endsWith(" ")) {
    return Err(
      new ParseError(
        "INVALID_BOUNDARY",
        "multipart boundary cannot end with whitespace"
      )
    );
  }

  if (!BOUNDARY_CHARS_REGEX.test(boundary)) {
    return Err(
      new ParseError(
        "INVALID_BOUNDARY",
        "multipart boundary contains invalid characters"
      )
    );
  }

  return Ok(boundary);
}

/**
 * Extracts and validates the boundary parameter from a request Content-Type value.
 * The parameter name is matched case-insensitively and the value may be quoted.
 */
export function extractBoundary(
  contentType: string | null | undefined
): Result<string, ParseError> {
  if (!contentType) {
    return Err(
      new ParseError("INVALID_CONTENT_TYPE", "missing Content-Type header")
    );
  }

  const { token: mediaType, params } = parseParameterizedValue(contentType);
  if (mediaType !== MULTIPART_FORM_DATA) {
    return Err(
      new ParseError(
        "INVALID_CONTENT_TYPE",
        "Content-Type must be multipart/form-data",
        { data: { received: mediaType } }
      )
    );
  }

  const boundary = params.boundary;
  if (boundary === undefined) {
    return Err(
      new ParseError("MISSING_BOUNDARY", "missing multipart boundary parameter")
    );
  }

  return validateBoundary(boundary);
}
