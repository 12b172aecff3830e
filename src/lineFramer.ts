const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export const DEFAULT_MAX_RECORD_BYTES = 4096;

export interface LineFramerOptions {
  /** Records longer than this are dropped whole (default 4096) */
  maxRecordBytes?: number;
  onOversize?: (bytes: number) => void;
}

/**
 * Splits a byte stream into newline-delimited records. Bytes, not text, are
 * carried between chunks so a record (or a multi-byte character) cut at any
 * offset decodes the same as one delivered whole.
 *
 * At most `maxRecordBytes` are held for an unfinished record. Past that the
 * record is skipped up to its newline and reported once through `onOversize`.
 */
export class LineFramer {
  private pending: Buffer = Buffer.alloc(0);
  // bytes already skipped from an oversized record still in progress
  private skipped = 0;
  private readonly maxRecordBytes: number;

  constructor(private readonly options: LineFramerOptions = {}) {
    this.maxRecordBytes = options.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES;
  }

  /** Feed raw data, returns the complete non-blank records it closed */
  push(chunk: Buffer): string[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: string[] = [];

    let start = 0;
    let newlineIndex: number;
    while ((newlineIndex = data.indexOf(NEWLINE, start)) !== -1) {
      const length = newlineIndex - start;
      if (this.skipped > 0 || length > this.maxRecordBytes) {
        this.dropOversized(length);
      } else {
        const line = decodeRecord(data.subarray(start, newlineIndex));
        if (line !== null) lines.push(line);
      }
      start = newlineIndex + 1;
    }

    const rest = data.length - start;
    if (this.skipped > 0 || rest > this.maxRecordBytes) {
      this.skipped += rest;
      this.pending = Buffer.alloc(0);
    } else {
      // copy so the caller's chunk is not retained
      this.pending = Buffer.from(data.subarray(start));
    }
    return lines;
  }

  /** Returns whatever partial record is left and clears it */
  flush(): string | null {
    if (this.skipped > 0) this.dropOversized(0);
    const rest = decodeRecord(this.pending);
    this.pending = Buffer.alloc(0);
    return rest;
  }

  get pendingBytes(): number {
    return this.pending.length;
  }

  private dropOversized(tailBytes: number): void {
    const total = this.skipped + tailBytes;
    this.skipped = 0;
    this.options.onOversize?.(total);
  }
}

function decodeRecord(bytes: Buffer): string | null {
  let end = bytes.length;
  if (end > 0 && bytes[end - 1] === CARRIAGE_RETURN) end--;
  // invalid sequences become U+FFFD
  const line = bytes.toString("utf8", 0, end);
  return line.trim() === "" ? null : line;
}

export interface FrameOptions extends LineFramerOptions {
  /** Yield a final record that has no newline when the source ends (default true) */
  flushTail?: boolean;
  onDiscard?: (bytes: number) => void;
}

/**
 * Lazily yields the records of a chunked byte source. It can be consumed
 * once; the source is read only as fast as records are taken.
 */
export async function* frameLines(source: AsyncIterable<Buffer>, options: FrameOptions = {}): AsyncGenerator<string> {
  const framer = new LineFramer({ maxRecordBytes: options.maxRecordBytes, onOversize: options.onOversize });
  for await (const chunk of source) {
    yield* framer.push(chunk);
  }

  const bytes = framer.pendingBytes;
  const rest = framer.flush();
  if (rest === null) return;
  if (options.flushTail ?? true) {
    yield rest;
  } else {
    options.onDiscard?.(bytes);
  }
}
