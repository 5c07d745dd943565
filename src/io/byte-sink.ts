/**
 * UTF-8 byte sink with growing capacity.
 *
 * Encodes written text into one buffer, doubling it (or growing to fit
 * the write) when a write does not fit.
 */

import type { XmlSink } from "./xml-sink";

export interface ByteSinkOptions {
  /** Initial buffer size in bytes. Default: 16384 (16KB) */
  initialSize?: number;
  /** Maximum buffer size in bytes. Throws if exceeded. Default: unlimited */
  maxSize?: number;
}

const encoder = new TextEncoder();

export class ByteSink implements XmlSink {
  private buffer: Uint8Array;
  private offset = 0;
  private readonly maxSize: number;

  constructor(options: ByteSinkOptions = {}) {
    this.maxSize = options.maxSize ?? Number.MAX_SAFE_INTEGER;
    this.buffer = new Uint8Array(options.initialSize ?? 16384);
  }

  /**
   * Make room for `byteCount` more bytes.
   *
   * @throws {Error} if the sink would grow past maxSize
   */
  private reserve(byteCount: number): void {
    const end = this.offset + byteCount;

    if (end > this.maxSize) {
      throw new Error(`ByteSink exceeded maximum size of ${this.maxSize} bytes`);
    }

    if (end > this.buffer.length) {
      const grown = new Uint8Array(Math.min(this.maxSize, Math.max(end, this.buffer.length * 2)));

      grown.set(this.buffer.subarray(0, this.offset));
      this.buffer = grown;
    }
  }

  /** Number of bytes written */
  get position(): number {
    return this.offset;
  }

  write(text: string): void {
    // Pure ASCII needs no encoder round trip
    if (/^[\x00-\x7f]*$/.test(text)) {
      this.reserve(text.length);

      for (let i = 0; i < text.length; i++) {
        this.buffer[this.offset++] = text.charCodeAt(i);
      }

      return;
    }

    const encoded = encoder.encode(text);

    this.reserve(encoded.length);
    this.buffer.set(encoded, this.offset);
    this.offset += encoded.length;
  }

  /** Copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
