import type { Readable } from 'node:stream';
import { ReadableStream, type ReadableStreamDefaultController } from 'node:stream/web';
import { UINT32_MAX, concatBytes, decodeUtf8, readUint32LE } from '../binary.js';
import { classifyMethod, requireCodec } from '../compression/registry.js';
import type { ZipMethod, ZipUnsupportedReason } from '../compression/types.js';
import { dosToDate } from '../dosTime.js';
import { ZipFormatError, ZipUnsupportedError, ZipUsageError } from '../errors.js';
import { hasZip64Extra } from '../extraFields.js';
import { normalizeLimits } from '../limits.js';
import {
  CENTRAL_HEADER_SIGNATURE,
  EOCD_SIGNATURE,
  FLAG_DATA_DESCRIPTOR,
  FLAG_ENCRYPTED,
  FLAG_UTF8,
  LOCAL_HEADER_SIGNATURE,
  LOCAL_HEADER_SIZE,
  parseLocalHeader,
  type LocalHeaderPrefix
} from '../records.js';
import { toWebReadable } from '../streams/adapters.js';
import { ByteCursor } from '../streams/cursor.js';
import { decodeCp437 } from '../text/cp437.js';
import type { ZipLimits, ZipNameEncoding, ZipStreamReaderOptions } from '../types.js';
import { decodeEntryData, enforceEntryLimits, type SourceFailure } from './entryStream.js';

/** An entry as described by its local header, met in storage order. */
export interface ZipStreamEntry {
  readonly name: string;
  readonly rawName: Uint8Array;
  readonly nameEncoding: ZipNameEncoding;
  readonly method: ZipMethod;
  readonly methodCode: number;
  readonly flags: number;
  readonly crc32: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  /** Offset of the local header in the stream. */
  readonly offset: number;
  readonly dosTime: number;
  readonly dosDate: number;
  readonly mtime: Date;
  readonly extra: Uint8Array;
  readonly isDirectory: boolean;
  readonly hasDataDescriptor: boolean;
  readonly encrypted: boolean;
  /** Decoded, CRC-verified contents. Valid until the iteration advances. */
  open(): Promise<ReadableStream<Uint8Array>>;
  /** Discard the entry's data. Advancing does this implicitly. */
  skip(): Promise<void>;
}

/**
 * Reads an archive front to back from a non-seekable stream, using local
 * headers only. Entries whose sizes follow their data (descriptor flag) have
 * no known end here and fail with `ZIP_DESCRIPTOR_REQUIRES_SEEK`.
 */
export class ZipStreamReader {
  private readonly cursor: ByteCursor;
  private readonly limits: Required<ZipLimits>;
  private iterating = false;

  private constructor(stream: ReadableStream<Uint8Array>, options?: ZipStreamReaderOptions) {
    this.cursor = new ByteCursor(stream);
    this.limits = normalizeLimits(options?.limits);
  }

  static fromStream(stream: ReadableStream<Uint8Array> | Readable, options?: ZipStreamReaderOptions): ZipStreamReader {
    return new ZipStreamReader(toWebReadable(stream), options);
  }

  /** Yields entries until the central directory begins. Can be iterated once. */
  async *entries(): AsyncGenerator<ZipStreamEntry> {
    if (this.iterating) {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', 'Stream entries can only be iterated once');
    }
    this.iterating = true;
    let count = 0;
    while (true) {
      const offset = this.cursor.position;
      const signatureBytes = await this.cursor.read(4);
      if (signatureBytes.length < 4) {
        throw new ZipFormatError('ZIP_TRUNCATED', 'Stream ended before the central directory', { offset });
      }
      const signature = readUint32LE(signatureBytes, 0);
      if (signature === CENTRAL_HEADER_SIGNATURE || signature === EOCD_SIGNATURE) return;
      if (signature !== LOCAL_HEADER_SIGNATURE) {
        throw new ZipFormatError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', { offset });
      }
      if (count >= this.limits.maxEntries) {
        throw new ZipUsageError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
          offset,
          context: { limitEntries: String(this.limits.maxEntries) }
        });
      }
      const rest = await this.cursor.read(LOCAL_HEADER_SIZE - 4);
      const header = parseLocalHeader(concatBytes([signatureBytes, rest]));
      if (!header) {
        throw new ZipFormatError('ZIP_TRUNCATED', 'Local file header truncated', { offset });
      }
      const variableLength = header.nameLength + header.extraLength;
      const variable = await this.cursor.read(variableLength);
      if (variable.length < variableLength) {
        throw new ZipFormatError('ZIP_TRUNCATED', 'Local file header truncated', { offset });
      }
      const entry = new StreamEntry(this.cursor, this.limits, header, variable, offset);
      count += 1;
      yield entry;
      await entry.release();
    }
  }

  /** Stop reading and cancel the underlying stream. */
  async close(): Promise<void> {
    await this.cursor.cancel();
  }
}

type StreamEntryState = 'pending' | 'opened' | 'skipped' | 'released';

class StreamEntry implements ZipStreamEntry {
  readonly name: string;
  readonly rawName: Uint8Array;
  readonly nameEncoding: ZipNameEncoding;
  readonly method: ZipMethod;
  readonly methodCode: number;
  readonly flags: number;
  readonly crc32: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly dosTime: number;
  readonly dosDate: number;
  readonly mtime: Date;
  readonly extra: Uint8Array;
  readonly isDirectory: boolean;
  readonly hasDataDescriptor: boolean;
  readonly encrypted: boolean;
  private state: StreamEntryState = 'pending';
  private remaining: number;
  private inflight: Promise<void> | null = null;

  constructor(
    private readonly cursor: ByteCursor,
    private readonly limits: Required<ZipLimits>,
    header: LocalHeaderPrefix,
    variable: Uint8Array,
    readonly offset: number
  ) {
    const utf8 = (header.flags & FLAG_UTF8) !== 0;
    this.rawName = variable.slice(0, header.nameLength);
    this.extra = variable.slice(header.nameLength);
    this.name = utf8 ? decodeUtf8(this.rawName) : decodeCp437(this.rawName);
    this.nameEncoding = utf8 ? 'utf8' : 'cp437';
    this.methodCode = header.method;
    this.flags = header.flags;
    this.crc32 = header.crc32;
    this.compressedSize = header.compressedSize;
    this.uncompressedSize = header.uncompressedSize;
    this.dosTime = header.dosTime;
    this.dosDate = header.dosDate;
    this.mtime = dosToDate(header.dosTime, header.dosDate);
    this.isDirectory = this.rawName.length > 0 && this.rawName[this.rawName.length - 1] === 0x2f;
    this.hasDataDescriptor = (header.flags & FLAG_DATA_DESCRIPTOR) !== 0;
    this.encrypted = (header.flags & FLAG_ENCRYPTED) !== 0;
    this.method = classifyMethod(header.method, this.unsupportedReason());
    this.remaining = header.compressedSize;
  }

  async open(): Promise<ReadableStream<Uint8Array>> {
    this.claim('opened');
    this.assertBounded();
    const codec = requireCodec(this.method, this.methodCode, this.name);
    enforceEntryLimits(this, this.limits);
    const failure: SourceFailure = {};
    return decodeEntryData(this.rawStream(failure), codec, this, failure);
  }

  async skip(): Promise<void> {
    this.claim('skipped');
    await this.discardRemaining();
  }

  /** Called by the iterator before it reads the next header. */
  async release(): Promise<void> {
    this.state = 'released';
    // A pull started before the release still owns the cursor.
    if (this.inflight) await Promise.allSettled([this.inflight]);
    await this.discardRemaining();
  }

  private claim(next: 'opened' | 'skipped'): void {
    if (this.state !== 'pending') {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Entry ${this.name} was already ${this.state}`, {
        entryName: this.name
      });
    }
    this.state = next;
  }

  private async discardRemaining(): Promise<void> {
    this.assertBounded();
    const wanted = this.remaining;
    const skipped = await this.cursor.skip(wanted);
    this.remaining -= skipped;
    if (skipped < wanted) {
      throw new ZipFormatError('ZIP_TRUNCATED', `Entry data ends ${wanted - skipped} bytes early`, {
        entryName: this.name,
        offset: this.offset
      });
    }
  }

  /** Without a known compressed size the next header cannot be found. */
  private assertBounded(): void {
    if (this.hasDataDescriptor) {
      throw new ZipUnsupportedError(
        'ZIP_DESCRIPTOR_REQUIRES_SEEK',
        'Entry sizes follow its data in a data descriptor; reading it requires a seekable source',
        { entryName: this.name, offset: this.offset }
      );
    }
    if (this.compressedSize === UINT32_MAX) {
      throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'ZIP64 sizes or offsets are not supported', {
        entryName: this.name,
        offset: this.offset
      });
    }
  }

  private rawStream(failure: SourceFailure): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
      pull: async (controller) => {
        const pulling = this.pullChunk(controller);
        this.inflight = pulling;
        try {
          await pulling;
        } catch (err) {
          failure.error ??= { value: err };
          throw err;
        } finally {
          this.inflight = null;
        }
      }
    });
  }

  private async pullChunk(controller: ReadableStreamDefaultController<Uint8Array>): Promise<void> {
    if (this.state === 'released') {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', 'Entry stream read after the iteration advanced', {
        entryName: this.name
      });
    }
    if (this.remaining <= 0) {
      controller.close();
      return;
    }
    const chunk = await this.cursor.next(this.remaining);
    if (!chunk) {
      throw new ZipFormatError('ZIP_TRUNCATED', `Entry data ends ${this.remaining} bytes early`, {
        entryName: this.name,
        offset: this.offset
      });
    }
    this.remaining -= chunk.length;
    controller.enqueue(chunk);
  }

  private unsupportedReason(): ZipUnsupportedReason | undefined {
    if (this.compressedSize === UINT32_MAX || this.uncompressedSize === UINT32_MAX || hasZip64Extra(this.extra)) {
      return 'zip64';
    }
    if (this.encrypted) return 'encryption';
    return undefined;
  }
}
