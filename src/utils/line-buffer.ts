/**
 * Line framing for worker stdout.
 *
 * Data arrives in arbitrary chunks that may split across lines or even
 * across UTF-8 multi-byte characters. LineBuffer accumulates partial data
 * and yields complete lines; StreamLineReader pulls lines from a web stream.
 */

export class LineBuffer {
  private buffer = "";
  private decoder = new TextDecoder("utf-8", { fatal: false });

  /**
   * Feed raw bytes or a string into the buffer.
   * Returns every complete line, empty ones included, without its terminator.
   */
  feed(chunk: string | Uint8Array): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    this.buffer += text;

    const lines = this.buffer.split("\n");
    // The last element is the (possibly empty) unterminated remainder
    this.buffer = lines.pop() ?? "";

    return lines.map(stripCarriageReturn);
  }

  /**
   * Flush any remaining data (e.g. at end of stream).
   * Returns the unterminated final line, or null when nothing is buffered.
   */
  flush(): string | null {
    const remaining = this.buffer + this.decoder.decode();
    this.buffer = "";
    return remaining ? stripCarriageReturn(remaining) : null;
  }

  /** Current buffer size in characters. */
  get size(): number {
    return this.buffer.length;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Reads one line at a time from a byte stream. Holds the stream's reader
 * lock for its whole life, so buffered bytes survive between callers.
 */
export class StreamLineReader {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly buffer = new LineBuffer();
  private readonly pending: string[] = [];
  private ended = false;
  private cancelled = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /** Next line without its terminator, or null at end of stream. */
  async readLine(): Promise<string | null> {
    while (this.pending.length === 0) {
      if (this.ended) return null;
      const chunk = await this.nextChunk();
      if (this.cancelled) return null;
      if (chunk === null) {
        this.ended = true;
        const tail = this.buffer.flush();
        if (tail !== null) this.pending.push(tail);
      } else {
        this.pending.push(...this.buffer.feed(chunk));
      }
    }
    return this.pending.shift() ?? null;
  }

  /** Stop reading; a pending readLine() resolves with null. */
  async cancel(): Promise<void> {
    if (this.cancelled) return;
    this.cancelled = true;
    this.ended = true;
    this.pending.length = 0;
    try {
      await this.reader.cancel();
    } catch {
      // Already errored
    }
  }

  private async nextChunk(): Promise<Uint8Array | null> {
    try {
      const { done, value } = await this.reader.read();
      return done ? null : value;
    } catch {
      // Stream errored -- expected when the process is killed mid-read
      return null;
    }
  }
}
