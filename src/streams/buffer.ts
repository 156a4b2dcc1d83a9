import type { ReadableStream } from 'node:stream/web';
import { concatBytes } from '../binary.js';

/** Drain a stream into one fresh Uint8Array (never a Buffer, even when the codec hands out Buffers). */
export async function readAllBytes(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      if (value.length === 0) continue;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concatBytes(chunks);
}
