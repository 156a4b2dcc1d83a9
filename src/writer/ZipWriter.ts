import type { Writable } from 'node:stream';
import type { ReadableStream, WritableStream } from 'node:stream/web';
import { decodeUtf8, encodeUtf8 } from '../binary.js';
import { METHOD_STORED } from '../compression/codecs.js';
import { getCompressionCodec } from '../compression/registry.js';
import type { ZipCompressionCodec } from '../compression/types.js';
import { dateToDos } from '../dosTime.js';
import { ZipUnsupportedError, ZipUsageError } from '../errors.js';
import { hasZip64Extra } from '../extraFields.js';
import { FileSink, NodeWritableSink } from '../node/zip/Sink.js';
import { isWebWritable } from '../streams/adapters.js';
import { createProgressTracker } from '../streams/progress.js';
import { isWebReadable, readableFromAsyncIterable, readableFromBytes } from '../streams/web.js';
import { decodeCp437 } from '../text/cp437.js';
import type { ZipEntry, ZipEntryOptions, ZipProgressOptions, ZipWriterOptions, ZipWriterState } from '../types.js';
import { WebWritableSink, isSeekableSink, type Sink } from './Sink.js';
import { writeCentralDirectory } from './centralDirectoryWriter.js';
import { EntryEncoder, descriptorTarget, patchTarget, type EntryStartInput, type EntryTarget } from './entryWriter.js';
import { finalizeArchive } from './finalize.js';

interface OpenEntry {
  handle: ZipEntryHandle;
  encoder: EntryEncoder | null;
  finishing: boolean;
}

const MAX_FIELD_BYTES = 0xffff;
const MAX_ENTRIES = 0xffff;
const DIRECTORY_ATTRIBUTE = 0x10;

export type ZipEntrySource = Uint8Array | ArrayBuffer | ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

/** Lease on the entry currently being written. Stale once finished. */
export interface ZipEntryHandle {
  readonly name: string;
  write(chunk: Uint8Array): Promise<void>;
  finish(): Promise<ZipEntry>;
}

/**
 * Incremental archive writer: `startEntry`, any number of `write`s, `finish`,
 * repeat, then `close`. One entry is open at a time. On a seekable sink the
 * local header is patched in place; otherwise a data descriptor follows the
 * entry data.
 */
export class ZipWriter {
  private readonly written: ZipEntry[] = [];
  private readonly patchLocalHeaders: boolean;
  private readonly defaultMethod: number;
  private readonly progress: ZipProgressOptions | undefined;
  /** Taken synchronously in startEntry; `encoder` stays null until the local header is written. */
  private current: OpenEntry | null = null;
  private finished = false;

  private constructor(
    private readonly sink: Sink,
    private readonly options: ZipWriterOptions = {}
  ) {
    this.defaultMethod = options.defaultMethod ?? 8;
    const policy = options.sinkSeekabilityPolicy ?? 'auto';
    const seekable = isSeekableSink(sink);
    if (policy === 'on' && !seekable) {
      throw new ZipUnsupportedError('ZIP_SINK_NOT_SEEKABLE', 'Seekable mode requires a sink with writeAt');
    }
    this.patchLocalHeaders = policy === 'off' ? false : seekable;
    this.progress = options.onProgress
      ? {
          onProgress: options.onProgress,
          ...(options.progressIntervalMs !== undefined ? { progressIntervalMs: options.progressIntervalMs } : {}),
          ...(options.progressChunkInterval !== undefined ? { progressChunkInterval: options.progressChunkInterval } : {})
        }
      : undefined;
  }

  static toSink(sink: Sink, options?: ZipWriterOptions): ZipWriter {
    return new ZipWriter(sink, options);
  }

  /** Non-seekable: every entry gets a data descriptor. */
  static toWritable(writable: WritableStream<Uint8Array> | Writable, options?: ZipWriterOptions): ZipWriter {
    const sink = isWebWritable(writable) ? new WebWritableSink(writable) : new NodeWritableSink(writable);
    return new ZipWriter(sink, options);
  }

  /** Create or truncate `path`. Headers are patched in place. */
  static toFile(path: string | URL, options?: ZipWriterOptions): ZipWriter {
    return new ZipWriter(new FileSink(path), options);
  }

  get state(): ZipWriterState {
    if (this.finished) return 'finished';
    return this.current ? 'entry-open' : 'idle';
  }

  /** Directory records of the entries finished so far, in write order. */
  entries(): readonly ZipEntry[] {
    return [...this.written];
  }

  /** Write the local header of a new entry and lease it to the caller. */
  async startEntry(name: string | Uint8Array, entryOptions: ZipEntryOptions = {}): Promise<ZipEntryHandle> {
    this.assertIdle();
    if (this.written.length >= MAX_ENTRIES) {
      throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', `More than ${MAX_ENTRIES} entries would need ZIP64`);
    }
    const input = this.prepareEntry(name, entryOptions);
    const target: EntryTarget = this.patchLocalHeaders && isSeekableSink(this.sink)
      ? patchTarget(this.sink)
      : descriptorTarget(this.sink);

    const handle: ZipEntryHandle = {
      name: input.name,
      write: (chunk) => this.write(handle, chunk),
      finish: () => this.finishEntry(handle)
    };
    const open: OpenEntry = { handle, encoder: null, finishing: false };
    this.current = open;
    try {
      open.encoder = await EntryEncoder.start(target, input);
    } catch (err) {
      await this.fail();
      throw err;
    }
    return handle;
  }

  async write(handle: ZipEntryHandle, chunk: Uint8Array): Promise<void> {
    const { encoder } = this.leased(handle);
    try {
      await encoder.write(chunk);
    } catch (err) {
      await this.fail();
      throw err;
    }
  }

  async finishEntry(handle: ZipEntryHandle): Promise<ZipEntry> {
    const { open, encoder } = this.leased(handle);
    open.finishing = true;
    let entry: ZipEntry;
    try {
      entry = await encoder.finish();
    } catch (err) {
      await this.fail();
      throw err;
    }
    this.current = null;
    this.written.push(entry);
    return entry;
  }

  /** Start, stream `source` into, and finish one entry. */
  async add(name: string | Uint8Array, source: ZipEntrySource, entryOptions?: ZipEntryOptions): Promise<ZipEntry> {
    const handle = await this.startEntry(name, entryOptions);
    const reader = toReadable(source).getReader();
    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) break;
        await handle.write(value);
      }
    } catch (err) {
      await Promise.allSettled([reader.cancel(err)]);
      throw err;
    } finally {
      reader.releaseLock();
    }
    return handle.finish();
  }

  /** Zero-length stored entry; a trailing `/` is appended when missing. */
  async addDirectory(name: string, entryOptions: Omit<ZipEntryOptions, 'method' | 'level'> = {}): Promise<ZipEntry> {
    const dirName = name.endsWith('/') ? name : `${name}/`;
    const handle = await this.startEntry(dirName, {
      ...entryOptions,
      method: METHOD_STORED,
      externalAttributes: entryOptions.externalAttributes ?? DIRECTORY_ATTRIBUTE
    });
    return handle.finish();
  }

  /** Write the central directory and trailer, then close the sink. */
  async close(comment?: string | Uint8Array): Promise<void> {
    this.assertIdle();
    const commentBytes = toFieldBytes(comment, 'Archive comment');
    this.finished = true;
    const tracker = createProgressTracker(this.progress, { kind: 'write' });
    try {
      const directory = await writeCentralDirectory(this.sink, this.written, tracker);
      await finalizeArchive(
        this.sink,
        { ...directory, entryCount: this.written.length, comment: commentBytes },
        tracker
      );
    } catch (err) {
      await Promise.allSettled([this.sink.close()]);
      throw err;
    }
    await this.sink.close();
  }

  private prepareEntry(name: string | Uint8Array, entryOptions: ZipEntryOptions): EntryStartInput {
    let rawName: Uint8Array;
    let displayName: string;
    let utf8: boolean;
    if (typeof name === 'string') {
      if (name.includes('\u0000')) {
        throw new ZipUsageError('ZIP_INVALID_ARGUMENT', 'Entry names must not contain NUL');
      }
      rawName = encodeUtf8(name);
      displayName = name;
      utf8 = true;
    } else {
      rawName = name.slice();
      utf8 = entryOptions.utf8 ?? false;
      displayName = utf8 ? decodeUtf8(rawName) : decodeCp437(rawName);
    }
    if (rawName.length > MAX_FIELD_BYTES) {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Entry name is ${rawName.length} bytes; at most ${MAX_FIELD_BYTES}`, {
        entryName: displayName
      });
    }
    const comment = toFieldBytes(entryOptions.comment, 'Entry comment', displayName);
    const extra = entryOptions.extra ? entryOptions.extra.slice() : new Uint8Array(0);
    if (extra.length > MAX_FIELD_BYTES) {
      throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Extra field is ${extra.length} bytes; at most ${MAX_FIELD_BYTES}`, {
        entryName: displayName
      });
    }
    if (hasZip64Extra(extra)) {
      throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'Extra field must not carry a ZIP64 record', {
        entryName: displayName
      });
    }

    const methodCode = entryOptions.method ?? this.defaultMethod;
    const codec = compressorFor(methodCode, displayName);
    const level = entryOptions.level ?? this.options.level;
    const dos = dateToDos(entryOptions.mtime ?? new Date());
    return {
      index: this.written.length,
      name: displayName,
      rawName,
      utf8,
      methodCode,
      codec,
      level,
      dosTime: dos.time,
      dosDate: dos.date,
      extra,
      comment,
      externalAttributes: (entryOptions.externalAttributes ?? 0) >>> 0,
      progress: this.progress
    };
  }

  private leased(handle: ZipEntryHandle): { open: OpenEntry; encoder: EntryEncoder } {
    if (this.finished) {
      throw new ZipUsageError('ZIP_WRITER_CLOSED', 'Writer is closed');
    }
    if (!this.current || this.current.handle !== handle) {
      throw new ZipUsageError('ZIP_NO_ENTRY_OPEN', `Entry ${handle.name} is not the open entry`, {
        entryName: handle.name
      });
    }
    const open = this.current;
    if (!open.encoder || open.finishing) {
      throw new ZipUsageError('ZIP_NO_ENTRY_OPEN', `Entry ${handle.name} is not accepting data`, {
        entryName: handle.name
      });
    }
    return { open, encoder: open.encoder };
  }

  private assertIdle(): void {
    if (this.finished) {
      throw new ZipUsageError('ZIP_WRITER_CLOSED', 'Writer is closed');
    }
    if (this.current) {
      throw new ZipUsageError('ZIP_ENTRY_IN_PROGRESS', `Entry ${this.current.handle.name} is still open`, {
        entryName: this.current.handle.name
      });
    }
  }

  /** A failed entry leaves the output unusable; further calls see a closed writer. */
  private async fail(): Promise<void> {
    this.finished = true;
    this.current = null;
    await Promise.allSettled([this.sink.close()]);
  }
}

function compressorFor(methodCode: number, entryName: string): ZipCompressionCodec {
  if (!Number.isInteger(methodCode) || methodCode < 0 || methodCode > 0xffff) {
    throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Invalid compression method ${methodCode}`, {
      entryName,
      method: methodCode
    });
  }
  const codec = getCompressionCodec(methodCode);
  if (!codec?.createCompressStream) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_METHOD', `No compressor registered for method ${methodCode}`, {
      entryName,
      method: methodCode
    });
  }
  return codec;
}

function toFieldBytes(value: string | Uint8Array | undefined, label: string, entryName?: string): Uint8Array {
  if (value === undefined) return new Uint8Array(0);
  const bytes = typeof value === 'string' ? encodeUtf8(value) : value.slice();
  if (bytes.length > MAX_FIELD_BYTES) {
    throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `${label} is ${bytes.length} bytes; at most ${MAX_FIELD_BYTES}`, {
      entryName
    });
  }
  return bytes;
}

function toReadable(source: ZipEntrySource): ReadableStream<Uint8Array> {
  if (source instanceof Uint8Array) return readableFromBytes(source);
  if (source instanceof ArrayBuffer) return readableFromBytes(new Uint8Array(source));
  if (isWebReadable(source)) return source;
  return readableFromAsyncIterable(source);
}
