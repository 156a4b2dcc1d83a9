import type { WritableStream, WritableStreamDefaultWriter } from 'node:stream/web';

/** Append-only byte sink. `position` counts bytes accepted so far. */
export interface Sink {
  position: number;
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/** Sink that can also overwrite bytes it already accepted. */
export interface SeekableSink extends Sink {
  writeAt(offset: number, chunk: Uint8Array): Promise<void>;
}

export function isSeekableSink(sink: Sink): sink is SeekableSink {
  return 'writeAt' in sink && typeof sink.writeAt === 'function';
}

export class WebWritableSink implements Sink {
  position = 0;
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;

  constructor(stream: WritableStream<Uint8Array>) {
    this.writer = stream.getWriter();
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.writer.write(chunk);
    this.position += chunk.length;
  }

  async close(): Promise<void> {
    await this.writer.close();
  }
}

/** Seekable sink backed by a growable in-memory buffer. */
export class MemorySink implements SeekableSink {
  position = 0;
  private buffer: Uint8Array;
  private closed = false;

  constructor(initialCapacity = 64 * 1024) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.assertOpen();
    if (chunk.length === 0) return;
    this.ensureCapacity(this.position + chunk.length);
    this.buffer.set(chunk, this.position);
    this.position += chunk.length;
  }

  async writeAt(offset: number, chunk: Uint8Array): Promise<void> {
    this.assertOpen();
    if (!Number.isInteger(offset) || offset < 0 || offset + chunk.length > this.position) {
      throw new RangeError(`writeAt(${offset}, ${chunk.length} bytes) is outside the ${this.position} bytes written`);
    }
    this.buffer.set(chunk, offset);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Copy of everything written so far. */
  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.position);
  }

  private assertOpen(): void {
    if (this.closed) throw new Error('MemorySink is closed');
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.position));
    this.buffer = next;
  }
}
