import { ReadableStream, type ReadableStreamReadResult } from 'node:stream/web';
import { requireCodec } from '../compression/registry.js';
import type { ZipCompressionCodec } from '../compression/types.js';
import { ZipError, ZipFormatError, ZipUsageError, type ZipWarning } from '../errors.js';
import { FLAG_DATA_DESCRIPTOR } from '../records.js';
import { createCrcTransform } from '../streams/crcTransform.js';
import { createProgressTracker, createProgressTransform, type ProgressTracker } from '../streams/progress.js';
import type { ZipEntry, ZipLimits, ZipProgressOptions } from '../types.js';
import type { RandomAccess } from './RandomAccess.js';
import { readLocalHeader, verifyDataDescriptor } from './localHeader.js';

const RANGE_CHUNK_SIZE = 64 * 1024;

export interface OpenEntryOptions extends ZipProgressOptions {
  limits: Required<ZipLimits>;
  /** First byte of the central directory; entry data must end before it. */
  directoryOffset: number;
  onWarning?: (warning: ZipWarning) => void;
}

/** First error raised while reading the entry's bytes; rethrown unchanged past the decoder. */
export interface SourceFailure {
  error?: { value: unknown };
}

export async function openRawStream(
  reader: RandomAccess,
  entry: ZipEntry,
  options: OpenEntryOptions
): Promise<{ stream: ReadableStream<Uint8Array>; dataOffset: number }> {
  const dataOffset = await locateEntryData(reader, entry, options);
  const readTracker = createProgressTracker(options, {
    kind: 'read',
    entryName: entry.name,
    totalIn: entry.compressedSize,
    totalOut: entry.compressedSize
  });
  const stream = createRangeStream(reader, dataOffset, entry.compressedSize, entry.name, {}).pipeThrough(
    createProgressTransform(readTracker)
  );
  return { stream, dataOffset };
}

/**
 * Validate an entry and return its decoded bytes. Output never exceeds the
 * declared uncompressed size; CRC and size are checked once the data is
 * exhausted, after every earlier chunk has been delivered.
 */
export async function openEntryStream(
  reader: RandomAccess,
  entry: ZipEntry,
  options: OpenEntryOptions
): Promise<ReadableStream<Uint8Array>> {
  const codec = requireCodec(entry.method, entry.methodCode, entry.name);
  enforceEntryLimits(entry, options.limits);
  const dataOffset = await locateEntryData(reader, entry, options);

  const failure: SourceFailure = {};
  const readTracker = createProgressTracker(options, {
    kind: 'read',
    entryName: entry.name,
    totalIn: entry.compressedSize,
    totalOut: entry.compressedSize
  });
  const raw = createRangeStream(reader, dataOffset, entry.compressedSize, entry.name, failure).pipeThrough(
    createProgressTransform(readTracker)
  );
  const extractTracker = createProgressTracker(options, {
    kind: 'extract',
    entryName: entry.name,
    totalIn: entry.uncompressedSize,
    totalOut: entry.uncompressedSize
  });
  return decodeEntryData(raw, codec, entry, failure, extractTracker);
}

/** Entry fields the decode pipeline checks its output against. */
export type DecodeTarget = Pick<ZipEntry, 'name' | 'methodCode' | 'crc32' | 'uncompressedSize'>;

/** Decode `raw` and hold the output to the entry's declared size and CRC. */
export async function decodeEntryData(
  raw: ReadableStream<Uint8Array>,
  codec: ZipCompressionCodec,
  target: DecodeTarget,
  failure: SourceFailure,
  tracker: ProgressTracker | null = null
): Promise<ReadableStream<Uint8Array>> {
  const decoder = await codec.createDecompressStream();
  const decoded = translateDecodeErrors(raw.pipeThrough(decoder), target, failure);
  const crcResult = { crc32: 0, bytes: 0 };
  return decoded
    .pipeThrough(
      createCrcTransform(crcResult, {
        expectedCrc: target.crc32,
        expectedSize: target.uncompressedSize,
        entryName: target.name
      })
    )
    .pipeThrough(createProgressTransform(tracker));
}

/** Run the local header checks and return where the compressed data starts. */
async function locateEntryData(reader: RandomAccess, entry: ZipEntry, options: OpenEntryOptions): Promise<number> {
  const local = await readLocalHeader(reader, entry, options.directoryOffset, options.onWarning);
  const dataEnd = local.dataOffset + entry.compressedSize;
  if (dataEnd > options.directoryOffset) {
    throw new ZipFormatError('ZIP_OUT_OF_RANGE', 'Entry data runs into the central directory', {
      entryName: entry.name,
      offset: local.dataOffset,
      context: {
        dataEnd: String(dataEnd),
        directoryOffset: String(options.directoryOffset)
      }
    });
  }
  if (entry.hasDataDescriptor || (local.header.flags & FLAG_DATA_DESCRIPTOR) !== 0) {
    await verifyDataDescriptor(reader, entry, dataEnd, options.directoryOffset);
  }
  return local.dataOffset;
}

export function enforceEntryLimits(
  entry: Pick<ZipEntry, 'name' | 'compressedSize' | 'uncompressedSize'>,
  limits: Required<ZipLimits>
): void {
  if (entry.uncompressedSize > limits.maxUncompressedEntryBytes) {
    throw new ZipUsageError('ZIP_LIMIT_EXCEEDED', 'Entry uncompressed size exceeds limit', {
      entryName: entry.name,
      context: {
        requiredBytes: String(entry.uncompressedSize),
        limitBytes: String(limits.maxUncompressedEntryBytes)
      }
    });
  }
  if (limits.maxCompressionRatio === Infinity || entry.uncompressedSize === 0) return;
  const ratio = entry.compressedSize === 0 ? Infinity : entry.uncompressedSize / entry.compressedSize;
  if (ratio > limits.maxCompressionRatio) {
    throw new ZipUsageError('ZIP_LIMIT_EXCEEDED', 'Entry compression ratio exceeds limit', {
      entryName: entry.name,
      context: {
        ratio: String(ratio),
        limitRatio: String(limits.maxCompressionRatio)
      }
    });
  }
}

function createRangeStream(
  reader: RandomAccess,
  offset: number,
  length: number,
  entryName: string,
  failure: SourceFailure
): ReadableStream<Uint8Array> {
  let position = offset;
  let remaining = length;

  const fail = (err: unknown): never => {
    failure.error ??= { value: err };
    throw err;
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      if (remaining <= 0) {
        controller.close();
        return;
      }
      const size = Math.min(remaining, RANGE_CHUNK_SIZE);
      const chunk = await reader.read(position, size).catch(fail);
      if (chunk.length === 0) {
        fail(
          new ZipFormatError('ZIP_TRUNCATED', `Entry data ends ${remaining} bytes early`, {
            entryName,
            offset: position
          })
        );
      }
      position += chunk.length;
      remaining -= chunk.length;
      controller.enqueue(chunk);
    }
  });
}

/**
 * Re-raise failures coming out of the decoder: read errors and ZipErrors pass
 * through unchanged, anything else is corrupt data.
 */
function translateDecodeErrors(
  stream: ReadableStream<Uint8Array>,
  entry: DecodeTarget,
  failure: SourceFailure
): ReadableStream<Uint8Array> {
  const reader = stream.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      let result: ReadableStreamReadResult<Uint8Array>;
      try {
        result = await reader.read();
      } catch (err) {
        throw translate(err);
      }
      if (result.done) {
        controller.close();
        return;
      }
      controller.enqueue(result.value);
    },
    async cancel(reason) {
      await reader.cancel(reason);
    }
  });

  function translate(err: unknown): unknown {
    if (failure.error) return failure.error.value;
    if (err instanceof ZipError) return err;
    return new ZipFormatError('ZIP_BAD_COMPRESSED_DATA', `Compressed data for ${entry.name} is corrupt`, {
      entryName: entry.name,
      method: entry.methodCode,
      cause: err
    });
  }
}
