import type { ReadableWritablePair } from 'node:stream/web';

/** Readable/writable pair used by ZIP compression codecs. */
export type ZipCompressionStream = ReadableWritablePair<Uint8Array, Uint8Array>;

/** Options for ZIP compression streams. */
export type ZipCompressionOptions = {
  /** Codec-specific effort level (deflate: 0-9). */
  level?: number;
};

/**
 * Codec for one ZIP compression method. Both directions must run in memory
 * bounded by the codec's own window, never by entry size.
 */
export type ZipCompressionCodec = {
  methodId: number;
  name: string;
  createDecompressStream(): ZipCompressionStream | Promise<ZipCompressionStream>;
  createCompressStream?(options?: ZipCompressionOptions): ZipCompressionStream | Promise<ZipCompressionStream>;
};

/** Why an entry's data cannot be opened even though it is listed. */
export type ZipUnsupportedReason = 'method' | 'zip64' | 'encryption' | 'multi-disk';

/** Classification of an entry's method, fixed when the directory is parsed. */
export type ZipMethod =
  | { kind: 'stored' }
  | { kind: 'deflate' }
  | { kind: 'registered'; code: number; name: string }
  | { kind: 'unsupported'; code: number; reason: ZipUnsupportedReason };
