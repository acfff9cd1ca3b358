/** Helpers for building multipart bodies in tests */

export interface TestPart {
  name: string;
  /** Present for file parts */
  filename?: string;
  contentType?: string;
  body: string | Uint8Array;
}

/** Encodes parts as a multipart/form-data body */
export function buildMultipart(boundary: string, parts: TestPart[]): Buffer {
  const pieces: Buffer[] = [];
  for (const part of parts) {
    const disposition =
      part.filename === undefined
        ? `form-data; name="${part.name}"`
        : `form-data; name="${part.name}"; filename="${part.filename}"`;
    let head = `--${boundary}\r\nContent-Disposition: ${disposition}\r\n`;
    if (part.contentType !== undefined) {
      head += `Content-Type: ${part.contentType}\r\n`;
    }
    pieces.push(Buffer.from(`${head}\r\n`));
    pieces.push(
      typeof part.body === "string" ? Buffer.from(part.body) : Buffer.from(part.body)
    );
    pieces.push(Buffer.from("\r\n"));
  }
  pieces.push(Buffer.from(`--${boundary}--\r\n`));
  return Buffer.concat(pieces);
}

/** Splits a buffer into chunks of at most `size` bytes */
export function splitChunks(data: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < data.byteLength; offset += size) {
    chunks.push(data.subarray(offset, offset + size));
  }
  return chunks;
}

/** Yields `data` in chunks of at most `size` bytes, counting how many were pulled */
export function chunkedBody(
  data: Uint8Array,
  size: number
): AsyncIterable<Uint8Array> & { pulled: () => number } {
  let pulled = 0;
  const chunks = splitChunks(data, size);
  return {
    pulled: () => pulled,
    async *[Symbol.asyncIterator]() {
      for (const chunk of chunks) {
        pulled += 1;
        yield chunk;
      }
    },
  };
}

export function multipartHeaders(boundary: string): Headers {
  return new Headers({
    "content-type": `multipart/form-data; boundary=${boundary}`,
  });
}
