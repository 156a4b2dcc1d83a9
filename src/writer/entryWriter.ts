import { TransformStream, type ReadableStream, type WritableStreamDefaultWriter } from 'node:stream/web';
import { UINT32_MAX, decodeUtf8, writeUint32LE } from '../binary.js';
import { classifyMethod } from '../compression/registry.js';
import type { ZipCompressionCodec, ZipCompressionStream } from '../compression/types.js';
import { dosToDate } from '../dosTime.js';
import { ZipUnsupportedError } from '../errors.js';
import {
  FLAG_DATA_DESCRIPTOR,
  FLAG_ENCRYPTED,
  FLAG_UTF8,
  LOCAL_HEADER_CRC_OFFSET,
  encodeDataDescriptor,
  encodeLocalHeader
} from '../records.js';
import { createCrcTransform } from '../streams/crcTransform.js';
import { createMeasureTransform } from '../streams/measure.js';
import { createProgressTracker, createProgressTransform, type ProgressTracker } from '../streams/progress.js';
import { decodeCp437 } from '../text/cp437.js';
import type { ZipEntry, ZipProgressOptions } from '../types.js';
import type { SeekableSink, Sink } from './Sink.js';

export const VERSION_NEEDED = 20;
/** Unix host, format version 2.0. */
export const VERSION_MADE_BY = (3 << 8) | VERSION_NEEDED;

export interface EntryStartInput {
  index: number;
  name: string;
  rawName: Uint8Array;
  utf8: boolean;
  methodCode: number;
  codec: ZipCompressionCodec;
  level?: number | undefined;
  dosTime: number;
  dosDate: number;
  extra: Uint8Array;
  comment: Uint8Array;
  externalAttributes: number;
  progress?: ZipProgressOptions | undefined;
}

export type EntryTarget = { mode: 'patch'; sink: SeekableSink } | { mode: 'descriptor'; sink: Sink };

/**
 * One entry being written: the local header is already on the sink and
 * payload bytes flow through CRC, codec and byte counting straight to it.
 * Memory use is bounded by the codec window, never by entry size.
 */
export class EntryEncoder {
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;
  private readonly pumped: Promise<void>;
  private readonly crcResult = { crc32: 0, bytes: 0 };
  private readonly measure = { bytes: 0 };
  private failure: { value: unknown } | null = null;
  private accepted = 0;

  private constructor(
    private readonly target: EntryTarget,
    private readonly input: EntryStartInput,
    private readonly headerOffset: number,
    private readonly flags: number,
    compressor: ZipCompressionStream,
    private readonly writeTracker: ProgressTracker | null,
    compressTracker: ProgressTracker | null
  ) {
    const entrance = new TransformStream<Uint8Array, Uint8Array>();
    this.writer = entrance.writable.getWriter();
    const stream = entrance.readable
      .pipeThrough(createCrcTransform(this.crcResult))
      .pipeThrough(createProgressTransform(compressTracker))
      .pipeThrough(compressor)
      .pipeThrough(createMeasureTransform(this.measure));
    this.pumped = pipeToSink(stream, target.sink, writeTracker);
    this.pumped.catch((err: unknown) => this.fail(err));
  }

  /** Write the local header and set up the encode pipeline. */
  static async start(target: EntryTarget, input: EntryStartInput): Promise<EntryEncoder> {
    const headerOffset = target.sink.position;
    if (headerOffset >= UINT32_MAX) {
      throw zip64Required(input.name, 'local header offset', headerOffset);
    }
    const flags = (input.utf8 ? FLAG_UTF8 : 0) | (target.mode === 'descriptor' ? FLAG_DATA_DESCRIPTOR : 0);
    const writeTracker = createProgressTracker(input.progress, { kind: 'write', entryName: input.name });
    const compressTracker = createProgressTracker(input.progress, { kind: 'compress', entryName: input.name });
    if (!input.codec.createCompressStream) {
      throw new ZipUnsupportedError('ZIP_UNSUPPORTED_METHOD', `Codec ${input.codec.name} cannot compress`, {
        entryName: input.name,
        method: input.methodCode
      });
    }
    const compressor = await input.codec.createCompressStream(
      input.level === undefined ? undefined : { level: input.level }
    );

    const header = encodeLocalHeader({
      versionNeeded: VERSION_NEEDED,
      flags,
      method: input.methodCode,
      dosTime: input.dosTime,
      dosDate: input.dosDate,
      crc32: 0,
      compressedSize: 0,
      uncompressedSize: 0,
      name: input.rawName,
      extra: input.extra
    });
    await target.sink.write(header);
    writeTracker?.update(header.length, header.length);
    return new EntryEncoder(target, input, headerOffset, flags, compressor, writeTracker, compressTracker);
  }

  get name(): string {
    return this.input.name;
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.throwIfFailed();
    if (chunk.length === 0) return;
    if (this.accepted + chunk.length >= UINT32_MAX) {
      const error = zip64Required(this.input.name, 'uncompressed size', this.accepted + chunk.length);
      this.fail(error);
      await this.writer.abort(error);
      throw error;
    }
    this.accepted += chunk.length;
    try {
      await this.writer.write(chunk);
    } catch (err) {
      this.fail(err);
      this.throwIfFailed();
    }
  }

  /** Flush the codec, then patch the local header or append a descriptor. */
  async finish(): Promise<ZipEntry> {
    this.throwIfFailed();
    try {
      await this.writer.close();
    } catch (err) {
      this.fail(err);
    }
    await Promise.allSettled([this.pumped]);
    this.throwIfFailed();

    const crc32 = this.crcResult.crc32;
    const uncompressedSize = this.crcResult.bytes;
    const compressedSize = this.measure.bytes;
    if (compressedSize >= UINT32_MAX) {
      throw zip64Required(this.input.name, 'compressed size', compressedSize);
    }

    if (this.target.mode === 'patch') {
      const patch = new Uint8Array(12);
      writeUint32LE(patch, 0, crc32);
      writeUint32LE(patch, 4, compressedSize);
      writeUint32LE(patch, 8, uncompressedSize);
      await this.target.sink.writeAt(this.headerOffset + LOCAL_HEADER_CRC_OFFSET, patch);
    } else {
      const descriptor = encodeDataDescriptor({ crc32, compressedSize, uncompressedSize });
      await this.target.sink.write(descriptor);
      this.writeTracker?.update(descriptor.length, descriptor.length);
    }
    this.writeTracker?.flush();

    const input = this.input;
    return Object.freeze({
      index: input.index,
      name: input.name,
      rawName: input.rawName,
      nameEncoding: input.utf8 ? 'utf8' : 'cp437',
      method: classifyMethod(input.methodCode),
      methodCode: input.methodCode,
      flags: this.flags,
      crc32,
      compressedSize,
      uncompressedSize,
      offset: this.headerOffset,
      dosTime: input.dosTime,
      dosDate: input.dosDate,
      mtime: dosToDate(input.dosTime, input.dosDate),
      versionMadeBy: VERSION_MADE_BY,
      versionNeeded: VERSION_NEEDED,
      diskStart: 0,
      internalAttributes: 0,
      externalAttributes: input.externalAttributes,
      extra: input.extra,
      rawComment: input.comment,
      comment: input.utf8 ? decodeUtf8(input.comment) : decodeCp437(input.comment),
      isDirectory: input.rawName.length > 0 && input.rawName[input.rawName.length - 1] === 0x2f,
      hasDataDescriptor: (this.flags & FLAG_DATA_DESCRIPTOR) !== 0,
      encrypted: (this.flags & FLAG_ENCRYPTED) !== 0
    } satisfies ZipEntry);
  }

  private fail(err: unknown): void {
    this.failure ??= { value: err };
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure.value;
  }
}

export function patchTarget(sink: SeekableSink): EntryTarget {
  return { mode: 'patch', sink };
}

export function descriptorTarget(sink: Sink): EntryTarget {
  return { mode: 'descriptor', sink };
}

function zip64Required(entryName: string, field: string, value: number): ZipUnsupportedError {
  return new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', `Entry ${field} would need ZIP64`, {
    entryName,
    context: { field, value: String(value) }
  });
}

async function pipeToSink(stream: ReadableStream<Uint8Array>, sink: Sink, tracker: ProgressTracker | null): Promise<void> {
  const reader = stream.getReader();
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      await sink.write(value);
      tracker?.update(value.length, value.length);
    }
  } catch (err) {
    await Promise.allSettled([reader.cancel(err)]);
    throw err;
  } finally {
    reader.releaseLock();
  }
}
