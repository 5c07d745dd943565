/**
 * Output sinks for serialized XML text.
 *
 * The writer pushes text into a sink as soon as each event is handled.
 * Sinks are owned by the caller: the writer flushes them but never closes
 * them.
 */

/**
 * Destination for serialized XML text.
 */
export interface XmlSink {
  /** Append text. Throwing aborts the current write. */
  write(text: string): void;

  /** Push buffered output to its destination, if the sink buffers. */
  flush?(): void;
}

/**
 * In-memory sink that collects everything written to it.
 */
export class StringSink implements XmlSink {
  private chunks: string[] = [];
  private length = 0;

  write(text: string): void {
    if (text.length === 0) {
      return;
    }

    this.chunks.push(text);
    this.length += text.length;
  }

  /** Number of UTF-16 code units written so far */
  get size(): number {
    return this.length;
  }

  /** Discard everything written so far */
  clear(): void {
    this.chunks = [];
    this.length = 0;
  }

  toString(): string {
    // Collapse to a single chunk so repeated calls stay cheap
    if (this.chunks.length > 1) {
      this.chunks = [this.chunks.join("")];
    }

    return this.chunks[0] ?? "";
  }
}
