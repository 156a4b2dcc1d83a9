export { ZipReader } from './reader/ZipReader.js';
export type { ZipEntryRef } from './reader/ZipReader.js';
export { ZipStreamReader } from './reader/ZipStreamReader.js';
export type { ZipStreamEntry } from './reader/ZipStreamReader.js';
export { BufferRandomAccess } from './reader/RandomAccess.js';
export type { RandomAccess } from './reader/RandomAccess.js';

export { ZipWriter } from './writer/ZipWriter.js';
export type { ZipEntryHandle, ZipEntrySource } from './writer/ZipWriter.js';
export { MemorySink, WebWritableSink, isSeekableSink } from './writer/Sink.js';
export type { SeekableSink, Sink } from './writer/Sink.js';

export { Crc32, crc32, updateCrc32 } from './crc32.js';
export { DEFAULT_LIMITS } from './limits.js';

export {
  ZipError,
  ZipFormatError,
  ZipIntegrityError,
  ZipUnsupportedError,
  ZipUsageError,
  isZipError
} from './errors.js';
export type {
  ZipErrorCode,
  ZipFormatErrorCode,
  ZipIntegrityErrorCode,
  ZipUnsupportedErrorCode,
  ZipUsageErrorCode,
  ZipWarning,
  ZipWarningCode
} from './errors.js';

export type {
  CentralDirectory,
  CompressionMethod,
  ZipEntry,
  ZipEntryOptions,
  ZipLimits,
  ZipMethod,
  ZipNameEncoding,
  ZipProgressEvent,
  ZipProgressOptions,
  ZipReaderOpenOptions,
  ZipReaderOptions,
  ZipStreamReaderOptions,
  ZipTrailer,
  ZipUnsupportedReason,
  ZipWriterOptions,
  ZipWriterState
} from './types.js';

export { DEFLATE_CODEC, METHOD_DEFLATE, METHOD_STORED, STORE_CODEC } from './compression/codecs.js';
export {
  getCompressionCodec,
  hasCompressionCodec,
  listCompressionCodecs,
  registerCompressionCodec,
  unregisterCompressionCodec
} from './compression/registry.js';
export type { ZipCompressionCodec, ZipCompressionOptions, ZipCompressionStream } from './compression/types.js';

export { toWebReadable, toWebWritable, toNodeReadable } from './streams/adapters.js';
