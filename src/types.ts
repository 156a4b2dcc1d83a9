import type { ZipMethod } from './compression/types.js';
import type { ZipWarning } from './errors.js';

export type { ZipMethod, ZipUnsupportedReason } from './compression/types.js';

/** ZIP compression method identifiers. */
export type CompressionMethod = 0 | 8 | (number & {});

/** How an entry name's bytes were decoded into `name`. */
export type ZipNameEncoding = 'utf8' | 'cp437';

/**
 * One directory record. Sizes, offsets and CRC are the 32-bit values stored in
 * the archive; they are only trusted once the entry's data has been decoded
 * and verified.
 */
export type ZipEntry = Readonly<{
  /** Position in storage order. */
  index: number;
  /** Display name (UTF-8 when flag bit 11 is set, else CP437). */
  name: string;
  /** Name exactly as stored. */
  rawName: Uint8Array;
  nameEncoding: ZipNameEncoding;
  method: ZipMethod;
  methodCode: number;
  flags: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  /** Local header offset. */
  offset: number;
  dosTime: number;
  dosDate: number;
  mtime: Date;
  versionMadeBy: number;
  versionNeeded: number;
  diskStart: number;
  internalAttributes: number;
  externalAttributes: number;
  /** Central extra-field block, opaque. */
  extra: Uint8Array;
  rawComment: Uint8Array;
  comment: string;
  isDirectory: boolean;
  hasDataDescriptor: boolean;
  encrypted: boolean;
}>;

/** Trailer fields used to locate and cross-check the directory. */
export type ZipTrailer = Readonly<{
  entryCount: number;
  directorySize: number;
  directoryOffset: number;
  eocdOffset: number;
}>;

/** Parsed central directory, built once when an archive is opened. */
export type CentralDirectory = Readonly<{
  entries: readonly ZipEntry[];
  comment: Uint8Array;
  commentText: string;
  trailer: ZipTrailer;
}>;

/** Progress event emitted while reading or writing entries. */
export type ZipProgressEvent = {
  kind: 'read' | 'extract' | 'write' | 'compress';
  entryName?: string;
  bytesIn: number;
  bytesOut: number;
  totalIn?: number;
  totalOut?: number;
};

/** Progress callback and throttling options. */
export type ZipProgressOptions = {
  onProgress?: (event: ZipProgressEvent) => void;
  progressIntervalMs?: number;
  progressChunkInterval?: number;
};

/** Limits applied when listing and opening entries. */
export type ZipLimits = {
  maxEntries?: number;
  maxUncompressedEntryBytes?: number;
  /** Declared uncompressed/compressed ratio; `Infinity` disables the check. */
  maxCompressionRatio?: number;
};

/** Options for creating ZipReader instances. */
export type ZipReaderOptions = {
  limits?: ZipLimits;
  onWarning?: (warning: ZipWarning) => void;
};

/** Options for opening ZIP entries. */
export type ZipReaderOpenOptions = ZipProgressOptions;

/** Options for the sequential (non-seekable) reader. */
export type ZipStreamReaderOptions = {
  limits?: ZipLimits;
};

/** Lifecycle of a ZipWriter. */
export type ZipWriterState = 'idle' | 'entry-open' | 'finished';

/** Options for creating ZipWriter instances. */
export type ZipWriterOptions = ZipProgressOptions & {
  defaultMethod?: CompressionMethod;
  /** Deflate level used when an entry does not set one. */
  level?: number;
  /** `auto` patches local headers when the sink can seek, `off` always writes data descriptors. */
  sinkSeekabilityPolicy?: 'auto' | 'on' | 'off';
};

/** Per-entry options for `startEntry` and `add`. */
export type ZipEntryOptions = {
  method?: CompressionMethod;
  level?: number;
  mtime?: Date;
  comment?: string | Uint8Array;
  externalAttributes?: number;
  /** Opaque extra-field block written to both headers. */
  extra?: Uint8Array;
  /** Mark a raw byte name as UTF-8. String names always are. */
  utf8?: boolean;
};
