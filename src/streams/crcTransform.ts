import { TransformStream } from 'node:stream/web';
import { Crc32 } from '../crc32.js';
import { ZipIntegrityError } from '../errors.js';

export interface CrcTransformResult {
  crc32: number;
  bytes: number;
}

export interface CrcTransformOptions {
  expectedCrc?: number;
  /** Declared uncompressed size; more output than this fails before it is delivered. */
  expectedSize?: number;
  entryName?: string;
}

/**
 * Accumulate CRC-32 and byte count over a stream. With expectations set, the
 * checks run in `flush`, i.e. only once the upstream is exhausted: a consumer
 * that cancels early never sees an integrity error.
 */
export function createCrcTransform(
  result: CrcTransformResult,
  options: CrcTransformOptions = {}
): TransformStream<Uint8Array, Uint8Array> {
  const crc = new Crc32();
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      if (options.expectedSize !== undefined && result.bytes + chunk.length > options.expectedSize) {
        throw new ZipIntegrityError(
          'ZIP_SIZE_MISMATCH',
          `${options.entryName ?? 'Entry'} decodes to more than its declared ${options.expectedSize} bytes`,
          { entryName: options.entryName }
        );
      }
      crc.update(chunk);
      result.bytes += chunk.length;
      controller.enqueue(chunk);
    },
    flush() {
      result.crc32 = crc.digest();
      if (options.expectedSize !== undefined && result.bytes !== options.expectedSize) {
        throw new ZipIntegrityError(
          'ZIP_SIZE_MISMATCH',
          `Uncompressed size mismatch for ${options.entryName ?? 'entry'}: expected ${options.expectedSize}, got ${result.bytes}`,
          { entryName: options.entryName }
        );
      }
      if (options.expectedCrc !== undefined && result.crc32 !== options.expectedCrc) {
        throw new ZipIntegrityError('ZIP_BAD_CRC', `CRC32 mismatch for ${options.entryName ?? 'entry'}`, {
          entryName: options.entryName,
          context: {
            expected: formatCrc(options.expectedCrc),
            actual: formatCrc(result.crc32)
          }
        });
      }
    }
  });
}

function formatCrc(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}
