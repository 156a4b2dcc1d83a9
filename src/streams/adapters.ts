import { Readable, Writable } from 'node:stream';
import type { ReadableStream, WritableStream } from 'node:stream/web';
import { isWebReadable } from './web.js';

export function isWebWritable(stream: unknown): stream is WritableStream<Uint8Array> {
  return typeof stream === 'object' && stream !== null && 'getWriter' in stream && typeof stream.getWriter === 'function';
}

export function toWebReadable(stream: ReadableStream<Uint8Array> | Readable): ReadableStream<Uint8Array> {
  if (isWebReadable(stream)) return stream;
  return Readable.toWeb(stream);
}

export function toWebWritable(stream: WritableStream<Uint8Array> | Writable): WritableStream<Uint8Array> {
  if (isWebWritable(stream)) return stream;
  return Writable.toWeb(stream);
}

export function toNodeReadable(stream: ReadableStream<Uint8Array> | Readable): Readable {
  if (!isWebReadable(stream)) return stream;
  return Readable.fromWeb(stream);
}
