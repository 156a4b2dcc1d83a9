import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import { concatBytes } from '../binary.js';

/**
 * Forward-only reader over a byte stream that hands out exact lengths. Bytes
 * are held only until they are consumed; nothing is read ahead beyond the
 * chunk the source delivered.
 */
export class ByteCursor {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private pending: Uint8Array = new Uint8Array(0);
  private ended = false;
  /** Bytes consumed so far. */
  position = 0;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  /** Up to `length` bytes; fewer only when the source ends. */
  async read(length: number): Promise<Uint8Array> {
    const parts: Uint8Array[] = [];
    let needed = length;
    while (needed > 0) {
      const chunk = await this.next(needed);
      if (!chunk) break;
      parts.push(chunk);
      needed -= chunk.length;
    }
    return parts.length === 1 ? parts[0]! : concatBytes(parts);
  }

  /** Discard up to `length` bytes and return how many were skipped. */
  async skip(length: number): Promise<number> {
    let skipped = 0;
    while (skipped < length) {
      const chunk = await this.next(length - skipped);
      if (!chunk) break;
      skipped += chunk.length;
    }
    return skipped;
  }

  /** Next slice of at most `max` bytes, or `null` at end of input. */
  async next(max: number): Promise<Uint8Array | null> {
    if (max <= 0) return new Uint8Array(0);
    while (this.pending.length === 0) {
      if (this.ended) return null;
      const { value, done } = await this.reader.read();
      if (done) {
        this.ended = true;
        return null;
      }
      this.pending = value;
    }
    const out = this.pending.subarray(0, Math.min(max, this.pending.length));
    this.pending = this.pending.subarray(out.length);
    this.position += out.length;
    return out;
  }

  async cancel(reason?: unknown): Promise<void> {
    this.pending = new Uint8Array(0);
    if (this.ended) return;
    this.ended = true;
    await this.reader.cancel(reason);
  }
}
