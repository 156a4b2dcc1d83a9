import { Duplex } from 'node:stream';
import { TransformStream } from 'node:stream/web';
import { constants, createDeflateRaw, createInflateRaw } from 'node:zlib';
import type { ZipCompressionCodec, ZipCompressionOptions, ZipCompressionStream } from './types.js';

export const METHOD_STORED = 0;
export const METHOD_DEFLATE = 8;

function nodeDuplexToWeb(duplex: Duplex): ZipCompressionStream {
  const { readable, writable } = Duplex.toWeb(duplex);
  return { readable, writable };
}

function passthroughStream(): ZipCompressionStream {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    }
  });
}

function deflateLevel(options?: ZipCompressionOptions): number {
  const level = options?.level;
  if (level === undefined || !Number.isInteger(level)) return constants.Z_DEFAULT_COMPRESSION;
  return Math.min(constants.Z_BEST_COMPRESSION, Math.max(constants.Z_NO_COMPRESSION, level));
}

export const STORE_CODEC: ZipCompressionCodec = {
  methodId: METHOD_STORED,
  name: 'store',
  createDecompressStream() {
    return passthroughStream();
  },
  createCompressStream() {
    return passthroughStream();
  }
};

export const DEFLATE_CODEC: ZipCompressionCodec = {
  methodId: METHOD_DEFLATE,
  name: 'deflate',
  createDecompressStream() {
    return nodeDuplexToWeb(createInflateRaw());
  },
  createCompressStream(options?: ZipCompressionOptions) {
    return nodeDuplexToWeb(createDeflateRaw({ level: deflateLevel(options) }));
  }
};
