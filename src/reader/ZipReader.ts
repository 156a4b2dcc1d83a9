import type { ReadableStream } from 'node:stream/web';
import { bytesEqual } from '../binary.js';
import { ZipUsageError, type ZipWarning } from '../errors.js';
import { normalizeLimits } from '../limits.js';
import { FileRandomAccess } from '../node/zip/RandomAccess.js';
import { readAllBytes } from '../streams/buffer.js';
import type {
  CentralDirectory,
  ZipEntry,
  ZipLimits,
  ZipProgressOptions,
  ZipReaderOpenOptions,
  ZipReaderOptions
} from '../types.js';
import { BufferRandomAccess, type RandomAccess } from './RandomAccess.js';
import { parseCentralDirectory, type ParsedDirectory } from './centralDirectory.js';
import { openEntryStream, openRawStream, type OpenEntryOptions } from './entryStream.js';

/** An entry, its index, or its name (decoded string or raw bytes). */
export type ZipEntryRef = ZipEntry | number | string | Uint8Array;

/**
 * Random-access archive reader. The directory is parsed once by `open` and is
 * immutable afterwards; every `openEntry` re-reads that entry's local header,
 * so several entry streams may be open at once.
 */
export class ZipReader {
  private readonly warningsList: ZipWarning[] = [];
  private readonly limits: Required<ZipLimits>;
  private parsed: ParsedDirectory | null = null;

  private constructor(
    private readonly reader: RandomAccess,
    private readonly options: ZipReaderOptions = {}
  ) {
    this.limits = normalizeLimits(options.limits);
  }

  /** Parse the directory of `source`. The reader owns the source afterwards and closes it in `close()`. */
  static async open(source: RandomAccess, options?: ZipReaderOptions): Promise<ZipReader> {
    const instance = new ZipReader(source, options);
    await instance.init();
    return instance;
  }

  static async fromUint8Array(data: Uint8Array, options?: ZipReaderOptions): Promise<ZipReader> {
    return ZipReader.open(new BufferRandomAccess(data), options);
  }

  static async fromFile(pathLike: string | URL, options?: ZipReaderOptions): Promise<ZipReader> {
    const reader = FileRandomAccess.fromPath(pathLike);
    try {
      return await ZipReader.open(reader, options);
    } catch (err) {
      await Promise.allSettled([reader.close()]);
      throw err;
    }
  }

  get directory(): CentralDirectory {
    return this.state().directory;
  }

  /** Archive comment, decoded. The raw bytes are on `directory.comment`. */
  get comment(): string {
    return this.state().directory.commentText;
  }

  entries(): readonly ZipEntry[] {
    return this.state().directory.entries;
  }

  entry(index: number): ZipEntry {
    const entry = Number.isInteger(index) ? this.state().directory.entries[index] : undefined;
    if (!entry) {
      throw new ZipUsageError('ZIP_ENTRY_NOT_FOUND', `No entry at index ${index}`, {
        context: { entryCount: String(this.state().directory.entries.length) }
      });
    }
    return entry;
  }

  /** First entry in storage order with this name, if any. */
  find(name: string | Uint8Array): ZipEntry | undefined {
    const { directory, byName } = this.state();
    if (typeof name === 'string') {
      const index = byName.get(name);
      return index === undefined ? undefined : directory.entries[index];
    }
    return directory.entries.find((entry) => bytesEqual(entry.rawName, name));
  }

  get(name: string | Uint8Array): ZipEntry {
    const entry = this.find(name);
    if (!entry) {
      const label = typeof name === 'string' ? name : `<${name.length} raw bytes>`;
      throw new ZipUsageError('ZIP_ENTRY_NOT_FOUND', `No entry named ${label}`, {
        ...(typeof name === 'string' ? { entryName: name } : {})
      });
    }
    return entry;
  }

  warnings(): ZipWarning[] {
    return [...this.warningsList];
  }

  /** Decoded, CRC-verified contents of an entry. */
  async openEntry(ref: ZipEntryRef, options?: ZipReaderOpenOptions): Promise<ReadableStream<Uint8Array>> {
    const entry = this.resolve(ref);
    return openEntryStream(this.reader, entry, this.openOptions(options));
  }

  /** Compressed bytes of an entry, exactly as stored. */
  async openRaw(ref: ZipEntryRef, options?: ZipReaderOpenOptions): Promise<ReadableStream<Uint8Array>> {
    const entry = this.resolve(ref);
    const { stream } = await openRawStream(this.reader, entry, this.openOptions(options));
    return stream;
  }

  async readEntry(ref: ZipEntryRef, options?: ZipReaderOpenOptions): Promise<Uint8Array> {
    const stream = await this.openEntry(ref, options);
    return readAllBytes(stream);
  }

  async close(): Promise<void> {
    await this.reader.close();
  }

  private async init(): Promise<void> {
    this.parsed = await parseCentralDirectory(this.reader, {
      limits: this.limits,
      onWarning: (warning) => this.pushWarning(warning)
    });
  }

  private state(): ParsedDirectory {
    if (!this.parsed) {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', 'Central directory has not been read');
    }
    return this.parsed;
  }

  private resolve(ref: ZipEntryRef): ZipEntry {
    if (typeof ref === 'number') return this.entry(ref);
    if (typeof ref === 'string' || ref instanceof Uint8Array) return this.get(ref);
    const own = this.state().directory.entries[ref.index];
    if (!own || own.offset !== ref.offset || !bytesEqual(own.rawName, ref.rawName)) {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', 'Entry does not belong to this archive', {
        entryName: ref.name
      });
    }
    return own;
  }

  private openOptions(options?: ZipProgressOptions): OpenEntryOptions {
    return {
      ...progressParams(options),
      limits: this.limits,
      directoryOffset: this.state().directory.trailer.directoryOffset,
      onWarning: (warning) => this.pushWarning(warning)
    };
  }

  private pushWarning(warning: ZipWarning): void {
    this.warningsList.push(warning);
    this.options.onWarning?.(warning);
  }
}

function progressParams(options?: ZipProgressOptions): Partial<ZipProgressOptions> {
  if (!options) return {};
  const params: Partial<ZipProgressOptions> = {};
  if (options.onProgress) params.onProgress = options.onProgress;
  if (options.progressIntervalMs !== undefined) params.progressIntervalMs = options.progressIntervalMs;
  if (options.progressChunkInterval !== undefined) params.progressChunkInterval = options.progressChunkInterval;
  return params;
}
