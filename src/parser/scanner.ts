import { ParseError } from "@/errors";
import { Err, Ok, type Result } from "@/utils";
import type { ScanEvent, ScannerOptions } from "./types";

const CR = 0x0d;
const LF = 0x0a;
const DASH = 0x2d;
const EMPTY = Buffer.alloc(0);
const HEADER_TERMINATOR = Buffer.from("\r\n\r\n");

type ScannerState = "preamble" | "headers" | "body" | "done" | "failed";

function toBuffer(chunk: Uint8Array): Buffer {
  return Buffer.isBuffer(chunk)
    ? chunk
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Incremental multipart boundary scanner.
 *
 * Each `feed` call consumes one chunk and returns the events it completes.
 * Undecided body bytes are held back only while they could still be the start
 * of a delimiter, so a boundary split across any number of chunks is found.
 * Part bodies are never inspected for anything but the CRLF-prefixed delimiter.
 */
export class BoundaryScanner {
  private readonly dashBoundary: Buffer;
  private readonly delimiter: Buffer;
  private readonly maxHeaderSize: number;
  private buffer: Buffer = EMPTY;
  private state: ScannerState = "preamble";
  private failure: ParseError | null = null;

  constructor(boundary: string, options: ScannerOptions) {
    if (boundary.length === 0 || boundary.includes("\r") || boundary.includes("\n")) {
      throw new ParseError(
        "INVALID_BOUNDARY",
        "multipart boundary cannot be empty or contain CRLF"
      );
    }
    this.dashBoundary = Buffer.from(`--${boundary}`);
    this.delimiter = Buffer.from(`\r\n--${boundary}`);
    this.maxHeaderSize = options.maxHeaderSize;
  }

  /** True once the terminal boundary has been seen */
  get isDone(): boolean {
    return this.state === "done";
  }

  /** Number of bytes currently held back between calls */
  get retained(): number {
    return this.buffer.length;
  }

  feed(chunk: Uint8Array): Result<ScanEvent[], ParseError> {
    if (this.failure) {
      return Err(this.failure);
    }
    if (this.state === "done" || chunk.byteLength === 0) {
      return Ok([]);
    }

    this.buffer =
      this.buffer.length === 0
        ? toBuffer(chunk)
        : Buffer.concat([this.buffer, chunk]);

    const events: ScanEvent[] = [];
    const error = this.drain(events);
    return error ? this.fail(error) : Ok(events);
  }

  /** Signals end of input. Fails unless the terminal boundary was seen. */
  end(): Result<ScanEvent[], ParseError> {
    if (this.failure) {
      return Err(this.failure);
    }
    if (this.state === "done") {
      return Ok([]);
    }
    return this.fail(
      new ParseError(
        "UNEXPECTED_EOF",
        "stream ended before the terminal boundary",
        { data: { state: this.state } }
      )
    );
  }

  private fail(error: ParseError): Result<never, ParseError> {
    this.state = "failed";
    this.failure = error;
    this.buffer = EMPTY;
    return Err(error);
  }

  private drain(events: ScanEvent[]): ParseError | null {
    for (;;) {
      switch (this.state) {
        case "preamble": {
          const step = this.scanOpening(events);
          if (step !== "continue") {
            return step === "wait" ? null : step;
          }
          break;
        }
        case "headers": {
          const step = this.scanHeaders(events);
          if (step !== "continue") {
            return step === "wait" ? null : step;
          }
          break;
        }
        case "body": {
          const step = this.scanBody(events);
          if (step !== "continue") {
            return step === "wait" ? null : step;
          }
          break;
        }
        default:
          return null;
      }
    }
  }

  /** The body must open with `--boundary` followed by CRLF, or `--` for an empty form */
  private scanOpening(events: ScanEvent[]): "continue" | "wait" | ParseError {
    const length = this.dashBoundary.length;
    const seen = Math.min(this.buffer.length, length);
    if (
      !this.buffer.subarray(0, seen).equals(this.dashBoundary.subarray(0, seen))
    ) {
      return new ParseError(
        "MALFORMED_BOUNDARY",
        "body does not start with the opening boundary"
      );
    }
    if (this.buffer.length < length + 2) {
      return "wait";
    }
    return this.afterBoundary(length, events);
  }

  /**
   * Header block runs from the CRLF that ended the boundary line up to the
   * next CRLFCRLF. An empty block is valid at this level.
   */
  private scanHeaders(events: ScanEvent[]): "continue" | "wait" | ParseError {
    const end = this.buffer.indexOf(HEADER_TERMINATOR);
    if (end === -1) {
      // terminator can start no earlier than length - 3
      if (this.buffer.length - 5 > this.maxHeaderSize) {
        return this.headerTooLarge();
      }
      return "wait";
    }

    const blockLength = Math.max(0, end - 2);
    if (blockLength > this.maxHeaderSize) {
      return this.headerTooLarge();
    }

    events.push({
      type: "partBegin",
      headers: this.buffer.subarray(2, 2 + blockLength),
    });
    this.buffer = this.buffer.subarray(end + HEADER_TERMINATOR.length);
    this.state = "body";
    return "continue";
  }

  private scanBody(events: ScanEvent[]): "continue" | "wait" | ParseError {
    const index = this.buffer.indexOf(this.delimiter);
    if (index === -1) {
      const safe = this.buffer.length - (this.delimiter.length - 1);
      if (safe > 0) {
        events.push({ type: "partData", data: this.buffer.subarray(0, safe) });
        this.buffer = this.buffer.subarray(safe);
      }
      return "wait";
    }

    if (index > 0) {
      events.push({ type: "partData", data: this.buffer.subarray(0, index) });
      this.buffer = this.buffer.subarray(index);
    }

    // delimiter now sits at offset 0; its two suffix bytes decide what follows
    const length = this.delimiter.length;
    if (this.buffer.length < length + 2) {
      return "wait";
    }
    events.push({ type: "partEnd" });
    return this.afterBoundary(length, events);
  }

  /** Reads the two bytes after a boundary at offset 0 of the buffer */
  private afterBoundary(
    boundaryEnd: number,
    events: ScanEvent[]
  ): "continue" | "wait" | ParseError {
    const first = this.buffer[boundaryEnd];
    const second = this.buffer[boundaryEnd + 1];

    if (first === CR && second === LF) {
      // keep the CRLF: it opens the header block
      this.buffer = this.buffer.subarray(boundaryEnd);
      this.state = "headers";
      return "continue";
    }

    if (first === DASH && second === DASH) {
      events.push({ type: "streamEnd" });
      this.buffer = EMPTY;
      this.state = "done";
      return "wait";
    }

    return new ParseError(
      "MALFORMED_BOUNDARY",
      "boundary must be followed by CRLF or '--'"
    );
  }

  private headerTooLarge(): ParseError {
    return new ParseError(
      "HEADER_TOO_LARGE",
      `part header block exceeds ${this.maxHeaderSize} bytes`,
      { data: { maxHeaderSize: this.maxHeaderSize } }
    );
  }
}
