/** Events emitted by the BoundaryScanner, in stream order */
export type ScanEvent =
  | { type: "partBegin"; headers: Uint8Array }
  | { type: "partData"; data: Uint8Array }
  | { type: "partEnd" }
  | { type: "streamEnd" };

export interface ScannerOptions {
  /** Maximum size in bytes of one part's header block */
  maxHeaderSize: number;
}

/** Parsed header block of one part */
export interface PartHeaders {
  fieldName: string;
  /** Client-supplied file name; present (possibly empty) only for file parts */
  fileName?: string;
  /** Content-Type value as sent, or the default for the part kind */
  contentType: string;
  /** All header lines, lowercased names, in order of appearance */
  raw: Array<[name: string, value: string]>;
}

export interface HeaderParserOptions {
  maxHeaderSize: number;
  maxFieldNameSize: number;
}
