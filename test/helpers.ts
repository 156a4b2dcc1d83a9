import assert from 'node:assert/strict';
import { WritableStream, type ReadableStream } from 'node:stream/web';
import { concatBytes, writeUint32LE } from '../src/binary.js';
import { updateCrc32 } from '../src/crc32.js';
import { isZipError, type ZipErrorCode } from '../src/errors.js';
import {
  FLAG_UTF8,
  encodeCentralHeader,
  encodeEocd,
  encodeLocalHeader,
  type CentralHeader,
  type EocdRecord,
  type LocalHeader
} from '../src/records.js';
import type { RandomAccess } from '../src/reader/RandomAccess.js';
import { readAllBytes } from '../src/streams/buffer.js';
import type { ZipEntryOptions, ZipWriterOptions } from '../src/types.js';
import { MemorySink } from '../src/writer/Sink.js';
import { ZipWriter } from '../src/writer/ZipWriter.js';

const encoder = new TextEncoder();

export function utf8(value: string): Uint8Array {
  return encoder.encode(value);
}

export async function collect(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  return readAllBytes(stream);
}

/** Fixed timestamp so separately written archives compare equal. */
export const FIXED_MTIME = new Date(2024, 0, 15, 10, 30, 44);

export interface InputEntry {
  name: string | Uint8Array;
  data: Uint8Array;
  options?: ZipEntryOptions;
}

/** Write `entries` through ZipWriter; seekable output goes to a MemorySink, the rest to a plain WritableStream. */
export async function writeArchive(
  entries: InputEntry[],
  options: ZipWriterOptions & { seekable?: boolean; comment?: string | Uint8Array } = {}
): Promise<Uint8Array> {
  const { seekable = true, comment, ...writerOptions } = options;
  if (seekable) {
    const sink = new MemorySink();
    const writer = ZipWriter.toSink(sink, writerOptions);
    for (const entry of entries) {
      await writer.add(entry.name, entry.data, { mtime: FIXED_MTIME, ...entry.options });
    }
    await writer.close(comment);
    return sink.toUint8Array();
  }
  const chunks: Uint8Array[] = [];
  const writable = new WritableStream<Uint8Array>({
    write(chunk) {
      chunks.push(chunk.slice());
    }
  });
  const writer = ZipWriter.toWritable(writable, writerOptions);
  for (const entry of entries) {
    await writer.add(entry.name, entry.data, { mtime: FIXED_MTIME, ...entry.options });
  }
  await writer.close(comment);
  return concatBytes(chunks);
}

export interface CraftEntry {
  name: string;
  /** Bytes stored in the archive, already compressed for non-zero methods. */
  payload: Uint8Array;
  method?: number;
  /** CRC and size of the decoded data; default to the payload's. */
  crc32?: number;
  uncompressedSize?: number;
  local?: Partial<LocalHeader>;
  central?: Partial<CentralHeader>;
  /** Raw bytes written between the payload and the next local header. */
  trailer?: Uint8Array;
}

/** Assemble an archive record by record, with per-field overrides for building damaged inputs. */
export function craftArchive(
  entries: CraftEntry[],
  options: { comment?: Uint8Array; eocd?: Partial<EocdRecord>; trailing?: Uint8Array } = {}
): Uint8Array {
  const parts: Uint8Array[] = [];
  const centrals: Uint8Array[] = [];
  let position = 0;
  for (const entry of entries) {
    const name = utf8(entry.name);
    const base: LocalHeader = {
      versionNeeded: 20,
      flags: FLAG_UTF8,
      method: entry.method ?? 0,
      dosTime: 0,
      dosDate: (44 << 9) | (1 << 5) | 15,
      crc32: entry.crc32 ?? updateCrc32(0, entry.payload),
      compressedSize: entry.payload.length,
      uncompressedSize: entry.uncompressedSize ?? entry.payload.length,
      name,
      extra: new Uint8Array(0)
    };
    const local = encodeLocalHeader({ ...base, ...entry.local });
    const central = encodeCentralHeader({
      ...base,
      versionMadeBy: (3 << 8) | 20,
      diskStart: 0,
      internalAttributes: 0,
      externalAttributes: 0,
      offset: position,
      comment: new Uint8Array(0),
      ...entry.central
    });
    const trailer = entry.trailer ?? new Uint8Array(0);
    parts.push(local, entry.payload, trailer);
    centrals.push(central);
    position += local.length + entry.payload.length + trailer.length;
  }
  const directory = concatBytes(centrals);
  const eocd = encodeEocd({
    diskNumber: 0,
    directoryDisk: 0,
    entriesOnDisk: entries.length,
    entryCount: entries.length,
    directorySize: directory.length,
    directoryOffset: position,
    comment: options.comment ?? new Uint8Array(0),
    ...options.eocd
  });
  return concatBytes([...parts, directory, eocd, options.trailing ?? new Uint8Array(0)]);
}

/** Copy of `bytes` with a little-endian uint32 replaced. */
export function withUint32(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const out = bytes.slice();
  writeUint32LE(out, offset, value);
  return out;
}

/** Copy of `bytes` with one byte replaced. */
export function withByte(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const out = bytes.slice();
  out[offset] = value;
  return out;
}

/** Source that reports its full size but returns nothing for reads starting inside `[from, to)`. */
export class GappedRandomAccess implements RandomAccess {
  constructor(
    private readonly data: Uint8Array,
    private readonly from: number,
    private readonly to: number
  ) {}

  async size(): Promise<number> {
    return this.data.length;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (offset >= this.from && offset < this.to) return new Uint8Array(0);
    return this.data.subarray(offset, Math.min(this.data.length, offset + length));
  }

  async close(): Promise<void> {
    return;
  }
}

/** Assert that `promise` rejects with a ZipError carrying `code`. */
export async function rejectsWithCode(promise: Promise<unknown>, code: ZipErrorCode): Promise<void> {
  await assert.rejects(promise, (err: unknown) => {
    assert.ok(isZipError(err), `expected a ZipError, got ${String(err)}`);
    assert.equal(err.code, code);
    return true;
  });
}

export function throwsWithCode(fn: () => unknown, code: ZipErrorCode): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(isZipError(err), `expected a ZipError, got ${String(err)}`);
    assert.equal(err.code, code);
    return true;
  });
}
