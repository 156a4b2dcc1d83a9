import { open } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Writable } from 'node:stream';
import { toWebWritable } from '../../streams/adapters.js';
import { WebWritableSink, type SeekableSink } from '../../writer/Sink.js';

export class NodeWritableSink extends WebWritableSink {
  constructor(stream: Writable) {
    super(toWebWritable(stream));
  }
}

/** Seekable sink over a file opened for writing (truncated on open). */
export class FileSink implements SeekableSink {
  position = 0;
  private readonly handlePromise: ReturnType<typeof open>;

  constructor(path: string | URL) {
    const filePath = typeof path === 'string' ? path : fileURLToPath(path);
    this.handlePromise = open(filePath, 'w');
    // Open failures surface from the first awaiting call.
    this.handlePromise.catch(() => undefined);
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    const handle = await this.handlePromise;
    await writeAll(handle, chunk, this.position);
    this.position += chunk.length;
  }

  async writeAt(offset: number, chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    const handle = await this.handlePromise;
    await writeAll(handle, chunk, offset);
  }

  async close(): Promise<void> {
    const handle = await this.handlePromise;
    await handle.close();
  }
}

async function writeAll(
  handle: Awaited<ReturnType<typeof open>>,
  chunk: Uint8Array,
  position: number
): Promise<void> {
  let written = 0;
  while (written < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, written, chunk.length - written, position + written);
    written += bytesWritten;
  }
}
