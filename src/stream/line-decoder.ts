const NEWLINE = 0x0a;
const CARRIAGE_RETURN = /\r$/;

/**
 * Splits a byte stream into newline-delimited lines. Splitting works on raw bytes and
 * only complete segments are decoded, so a multi-byte character cut across two chunks
 * is reassembled before decoding.
 */
export class LineDecoder {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  /** Bytes held for the current unterminated line. */
  get bufferedBytes(): number {
    return this.pendingBytes;
  }

  push(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    const lines: string[] = [];
    let start = 0;
    let newlineIdx = bytes.indexOf(NEWLINE, start);
    while (newlineIdx !== -1) {
      lines.push(this.takeLine(bytes.subarray(start, newlineIdx)));
      start = newlineIdx + 1;
      newlineIdx = bytes.indexOf(NEWLINE, start);
    }
    if (start < bytes.length) {
      this.pending.push(bytes.subarray(start));
      this.pendingBytes += bytes.length - start;
    }
    return lines;
  }

  /** Returns the unterminated remainder, if any, and resets the decoder. */
  flush(): string | undefined {
    if (this.pendingBytes === 0) {
      return undefined;
    }
    return this.takeLine(Buffer.alloc(0));
  }

  private takeLine(tail: Buffer): string {
    const bytes = this.pending.length > 0 ? Buffer.concat([...this.pending, tail]) : tail;
    this.pending = [];
    this.pendingBytes = 0;
    return bytes.toString("utf8").replace(CARRIAGE_RETURN, "");
  }
}

/**
 * Lazily yields the lines of `source`. A final line without a trailing newline is
 * still yielded once the source ends.
 */
export async function* decodeLines(
  source: AsyncIterable<Buffer | string>,
): AsyncGenerator<string, void, undefined> {
  const decoder = new LineDecoder();
  for await (const chunk of source) {
    for (const line of decoder.push(chunk)) {
      yield line;
    }
  }
  const rest = decoder.flush();
  if (rest !== undefined) {
    yield rest;
  }
}
