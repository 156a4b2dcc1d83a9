import { encodeEocd } from '../records.js';
import type { ProgressTracker } from '../streams/progress.js';
import type { CentralDirectoryInfo } from './centralDirectoryWriter.js';
import type { Sink } from './Sink.js';

export interface FinalizeOptions extends CentralDirectoryInfo {
  entryCount: number;
  comment: Uint8Array;
}

/** Single-disk trailer: both entry counts equal, disk numbers zero. */
export async function finalizeArchive(
  sink: Sink,
  options: FinalizeOptions,
  tracker?: ProgressTracker | null
): Promise<void> {
  const eocd = encodeEocd({
    diskNumber: 0,
    directoryDisk: 0,
    entriesOnDisk: options.entryCount,
    entryCount: options.entryCount,
    directorySize: options.size,
    directoryOffset: options.offset,
    comment: options.comment
  });
  await sink.write(eocd);
  tracker?.update(eocd.length, eocd.length);
  tracker?.flush();
}
