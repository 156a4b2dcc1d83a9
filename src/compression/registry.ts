import { ZipUnsupportedError, ZipUsageError } from '../errors.js';
import type { ZipCompressionCodec, ZipMethod, ZipUnsupportedReason } from './types.js';
import { DEFLATE_CODEC, METHOD_DEFLATE, METHOD_STORED, STORE_CODEC } from './codecs.js';

const codecs = new Map<number, ZipCompressionCodec>();
const BUILTIN_METHODS = new Set<number>([METHOD_STORED, METHOD_DEFLATE]);

/** Register a custom ZIP compression codec by method id. */
export function registerCompressionCodec(codec: ZipCompressionCodec): void {
  if (!Number.isInteger(codec.methodId) || codec.methodId < 0 || codec.methodId > 0xffff) {
    throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Invalid compression method id ${codec.methodId}`, {
      method: codec.methodId
    });
  }
  if (BUILTIN_METHODS.has(codec.methodId)) {
    throw new ZipUsageError('ZIP_INVALID_ARGUMENT', `Compression method ${codec.methodId} is built in`, {
      method: codec.methodId
    });
  }
  codecs.set(codec.methodId, codec);
}

/** Remove a custom codec. Built-in codecs stay registered. */
export function unregisterCompressionCodec(methodId: number): boolean {
  if (BUILTIN_METHODS.has(methodId)) return false;
  return codecs.delete(methodId);
}

/** Look up a registered ZIP compression codec by method id. */
export function getCompressionCodec(methodId: number): ZipCompressionCodec | undefined {
  return codecs.get(methodId);
}

/** Check whether a ZIP compression codec is registered. */
export function hasCompressionCodec(methodId: number): boolean {
  return codecs.has(methodId);
}

/** List all registered ZIP compression codecs. */
export function listCompressionCodecs(): ZipCompressionCodec[] {
  return [...codecs.values()];
}

/** Classify a method code against the registry, or force an unsupported reason. */
export function classifyMethod(code: number, forced?: ZipUnsupportedReason): ZipMethod {
  if (forced) return { kind: 'unsupported', code, reason: forced };
  if (code === METHOD_STORED) return { kind: 'stored' };
  if (code === METHOD_DEFLATE) return { kind: 'deflate' };
  const codec = codecs.get(code);
  if (codec) return { kind: 'registered', code, name: codec.name };
  return { kind: 'unsupported', code, reason: 'method' };
}

/** Resolve the codec that decodes an entry, or raise the deferred unsupported error. */
export function requireCodec(method: ZipMethod, code: number, entryName?: string): ZipCompressionCodec {
  if (method.kind === 'unsupported') {
    throw unsupportedError(method.reason, code, entryName);
  }
  const codec = codecs.get(code);
  if (!codec) {
    throw unsupportedError('method', code, entryName);
  }
  return codec;
}

export function unsupportedError(reason: ZipUnsupportedReason, code: number, entryName?: string): ZipUnsupportedError {
  switch (reason) {
    case 'method':
      return new ZipUnsupportedError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${code}`, {
        entryName,
        method: code
      });
    case 'zip64':
      return new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'ZIP64 sizes or offsets are not supported', {
        entryName,
        method: code
      });
    case 'encryption':
      return new ZipUnsupportedError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
        entryName,
        method: code
      });
    case 'multi-disk':
      return new ZipUnsupportedError('ZIP_UNSUPPORTED_MULTI_DISK', 'Entry starts on another disk of a spanned archive', {
        entryName,
        method: code
      });
    default: {
      const exhaustive: never = reason;
      return exhaustive;
    }
  }
}

function registerBuiltins(): void {
  codecs.set(STORE_CODEC.methodId, STORE_CODEC);
  codecs.set(DEFLATE_CODEC.methodId, DEFLATE_CODEC);
}

registerBuiltins();
