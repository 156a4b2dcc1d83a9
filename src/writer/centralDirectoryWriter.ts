import { UINT32_MAX } from '../binary.js';
import { ZipUnsupportedError } from '../errors.js';
import { encodeCentralHeader } from '../records.js';
import type { ProgressTracker } from '../streams/progress.js';
import type { ZipEntry } from '../types.js';
import type { Sink } from './Sink.js';

export interface CentralDirectoryInfo {
  offset: number;
  size: number;
}

/** Append one central header per finished entry, in the order they were written. */
export async function writeCentralDirectory(
  sink: Sink,
  entries: readonly ZipEntry[],
  tracker?: ProgressTracker | null
): Promise<CentralDirectoryInfo> {
  const offset = sink.position;
  if (offset >= UINT32_MAX) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'Central directory offset would need ZIP64', {
      offset
    });
  }
  let size = 0;
  for (const entry of entries) {
    const header = encodeCentralHeader({
      versionMadeBy: entry.versionMadeBy,
      versionNeeded: entry.versionNeeded,
      flags: entry.flags,
      method: entry.methodCode,
      dosTime: entry.dosTime,
      dosDate: entry.dosDate,
      crc32: entry.crc32,
      compressedSize: entry.compressedSize,
      uncompressedSize: entry.uncompressedSize,
      diskStart: 0,
      internalAttributes: entry.internalAttributes,
      externalAttributes: entry.externalAttributes,
      offset: entry.offset,
      name: entry.rawName,
      extra: entry.extra,
      comment: entry.rawComment
    });
    await sink.write(header);
    tracker?.update(header.length, header.length);
    size += header.length;
  }
  if (size >= UINT32_MAX) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'Central directory size would need ZIP64', {
      offset
    });
  }
  return { offset, size };
}
