import { UINT32_MAX, readUint32LE } from '../binary.js';
import { ZipFormatError, ZipUnsupportedError, type ZipWarning } from '../errors.js';
import { EOCD_SIZE, parseEocd, type EocdRecord } from '../records.js';
import { readFully, type RandomAccess } from './RandomAccess.js';

const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_LOCATOR_SIZE = 20;
const MAX_COMMENT_LENGTH = 0xffff;

export interface EocdResult extends EocdRecord {
  eocdOffset: number;
}

interface Candidate {
  index: number;
  record: EocdRecord & { commentLength: number };
  endsAtEof: boolean;
  directoryAdjacent: boolean;
}

/**
 * Locate the end-of-central-directory record in the last 22 + 65535 bytes.
 *
 * Candidates are scanned from the end. The first one whose record ends at EOF
 * and whose directory ends where the record starts wins; failing that, the
 * first one ending at EOF; failing that, the last signature in the window
 * (with a trailing-bytes warning). Signature matches closer to EOF than the
 * chosen record lie inside its comment and are reported as skipped.
 */
export async function findEocd(
  reader: RandomAccess,
  size: number,
  onWarning: (warning: ZipWarning) => void
): Promise<EocdResult> {
  if (size < EOCD_SIZE) {
    throw new ZipFormatError('ZIP_EOCD_NOT_FOUND', 'File too small for EOCD');
  }
  const searchSize = Math.min(size, EOCD_SIZE + MAX_COMMENT_LENGTH);
  const searchStart = size - searchSize;
  const buffer = await readFully(reader, searchStart, searchSize);
  if (buffer.length < searchSize) {
    throw new ZipFormatError('ZIP_TRUNCATED', 'Source ended before its reported size', { offset: searchStart });
  }

  const candidates: Candidate[] = [];
  for (let i = buffer.length - EOCD_SIZE; i >= 0; i -= 1) {
    const record = parseEocd(buffer, i);
    if (!record) continue;
    const eocdOffset = searchStart + i;
    candidates.push({
      index: i,
      record,
      endsAtEof: i + EOCD_SIZE + record.commentLength === buffer.length,
      directoryAdjacent: record.directoryOffset + record.directorySize === eocdOffset
    });
  }

  if (candidates.length === 0) {
    throw new ZipFormatError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }

  const chosen =
    candidates.find((candidate) => candidate.endsAtEof && candidate.directoryAdjacent) ??
    candidates.find((candidate) => candidate.endsAtEof) ??
    candidates[0]!;

  for (const candidate of candidates) {
    if (candidate.index <= chosen.index) break;
    onWarning({
      code: 'ZIP_EOCD_CANDIDATE_SKIPPED',
      message: `Skipped EOCD signature at offset ${searchStart + candidate.index} inside the archive comment`
    });
  }

  const eocdOffset = searchStart + chosen.index;
  const { record } = chosen;
  if (!chosen.endsAtEof) {
    const recordEnd = chosen.index + EOCD_SIZE + record.commentLength;
    if (recordEnd > buffer.length) {
      throw new ZipFormatError('ZIP_TRUNCATED', 'Archive comment extends past end of file', { offset: eocdOffset });
    }
    onWarning({
      code: 'ZIP_TRAILING_BYTES',
      message: `${buffer.length - recordEnd} bytes follow the end of central directory record`
    });
  }

  await rejectZip64Trailer(reader, eocdOffset, record);

  if (record.diskNumber !== 0 || record.directoryDisk !== 0 || record.entriesOnDisk !== record.entryCount) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_MULTI_DISK', 'Multi-disk ZIP archives are not supported', {
      offset: eocdOffset,
      context: {
        diskNumber: String(record.diskNumber),
        directoryDisk: String(record.directoryDisk),
        entriesOnDisk: String(record.entriesOnDisk),
        entryCount: String(record.entryCount)
      }
    });
  }

  const directoryEnd = record.directoryOffset + record.directorySize;
  if (directoryEnd > size) {
    throw new ZipFormatError('ZIP_TRUNCATED', 'Central directory extends past end of file', {
      offset: record.directoryOffset
    });
  }
  if (directoryEnd > eocdOffset) {
    throw new ZipFormatError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory overlaps the EOCD record', {
      offset: record.directoryOffset
    });
  }

  return {
    eocdOffset,
    diskNumber: record.diskNumber,
    directoryDisk: record.directoryDisk,
    entriesOnDisk: record.entriesOnDisk,
    entryCount: record.entryCount,
    directorySize: record.directorySize,
    directoryOffset: record.directoryOffset,
    comment: record.comment
  };
}

/**
 * A ZIP64 locator right before the record, or a saturated size or offset,
 * means the real directory lives in a ZIP64 record this codec does not read.
 * An entry count of 0xFFFF is taken literally unless a locator is present.
 */
async function rejectZip64Trailer(reader: RandomAccess, eocdOffset: number, record: EocdRecord): Promise<void> {
  const saturated =
    record.directorySize === UINT32_MAX ||
    record.directoryOffset === UINT32_MAX ||
    record.diskNumber === 0xffff ||
    record.directoryDisk === 0xffff;
  let locator = false;
  if (eocdOffset >= ZIP64_LOCATOR_SIZE) {
    const bytes = await readFully(reader, eocdOffset - ZIP64_LOCATOR_SIZE, 4);
    locator = bytes.length === 4 && readUint32LE(bytes, 0) === ZIP64_LOCATOR_SIGNATURE;
  }
  if (saturated || locator) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'ZIP64 archives are not supported', {
      offset: eocdOffset
    });
  }
}
