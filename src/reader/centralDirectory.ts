import { UINT16_MAX, UINT32_MAX, copyBytes, decodeUtf8 } from '../binary.js';
import { classifyMethod } from '../compression/registry.js';
import type { ZipUnsupportedReason } from '../compression/types.js';
import { dosToDate } from '../dosTime.js';
import { ZipFormatError, ZipUsageError, type ZipWarning } from '../errors.js';
import { hasZip64Extra } from '../extraFields.js';
import {
  CENTRAL_HEADER_SIZE,
  FLAG_DATA_DESCRIPTOR,
  FLAG_ENCRYPTED,
  FLAG_UTF8,
  LOCAL_HEADER_SIZE,
  parseCentralHeader,
  type CentralHeaderPrefix
} from '../records.js';
import { decodeCp437 } from '../text/cp437.js';
import type { CentralDirectory, ZipEntry, ZipLimits } from '../types.js';
import type { RandomAccess } from './RandomAccess.js';
import { findEocd } from './eocd.js';

const READ_CHUNK_SIZE = 64 * 1024;
const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export interface ParsedDirectory {
  directory: CentralDirectory;
  /** Decoded name to the index of its first occurrence. */
  byName: Map<string, number>;
}

export interface ParseDirectoryOptions {
  limits: Required<ZipLimits>;
  onWarning: (warning: ZipWarning) => void;
}

/**
 * Build the immutable directory of an archive. All or nothing: any structural
 * problem throws and no partial directory is returned. Per-entry unsupported
 * features are recorded on the entry's method and only raised on open.
 */
export async function parseCentralDirectory(
  reader: RandomAccess,
  options: ParseDirectoryOptions
): Promise<ParsedDirectory> {
  const size = await reader.size();
  const eocd = await findEocd(reader, size, options.onWarning);

  if (eocd.entryCount > options.limits.maxEntries) {
    throw new ZipUsageError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
      context: {
        requiredEntries: String(eocd.entryCount),
        limitEntries: String(options.limits.maxEntries)
      }
    });
  }

  const entries: ZipEntry[] = [];
  const byName = new Map<string, number>();
  const cursor = new DirectoryCursor(reader, eocd.directoryOffset, eocd.directorySize);

  for (let index = 0; index < eocd.entryCount; index += 1) {
    const recordOffset = cursor.offset;
    const fixed = await cursor.take(CENTRAL_HEADER_SIZE, index, eocd.entryCount);
    const header = parseCentralHeader(fixed, 0);
    if (!header) {
      throw new ZipFormatError('ZIP_BAD_CENTRAL_DIRECTORY', `Invalid central directory signature for record ${index}`, {
        offset: recordOffset
      });
    }
    const variable = await cursor.take(
      header.nameLength + header.extraLength + header.commentLength,
      index,
      eocd.entryCount
    );
    const entry = buildEntry(index, header, variable, eocd.directoryOffset, recordOffset);
    entries.push(entry);

    const first = byName.get(entry.name);
    if (first === undefined) {
      byName.set(entry.name, index);
    } else {
      options.onWarning({
        code: 'ZIP_DUPLICATE_NAME',
        message: `Entry ${index} repeats the name of entry ${first}; name lookup resolves to entry ${first}`,
        entryName: entry.name
      });
    }
  }

  if (cursor.remaining !== 0) {
    throw new ZipFormatError(
      'ZIP_BAD_CENTRAL_DIRECTORY',
      `Central directory has ${cursor.remaining} bytes beyond its ${eocd.entryCount} records`,
      { offset: cursor.offset }
    );
  }

  const directory: CentralDirectory = Object.freeze({
    entries: Object.freeze(entries),
    comment: copyBytes(eocd.comment),
    commentText: decodeArchiveComment(eocd.comment),
    trailer: Object.freeze({
      entryCount: eocd.entryCount,
      directorySize: eocd.directorySize,
      directoryOffset: eocd.directoryOffset,
      eocdOffset: eocd.eocdOffset
    })
  });
  return { directory, byName };
}

function buildEntry(
  index: number,
  header: CentralHeaderPrefix,
  variable: Uint8Array,
  directoryOffset: number,
  recordOffset: number
): ZipEntry {
  const utf8 = (header.flags & FLAG_UTF8) !== 0;
  const rawName = copyBytes(variable.subarray(0, header.nameLength));
  const extra = copyBytes(variable.subarray(header.nameLength, header.nameLength + header.extraLength));
  const rawComment = copyBytes(variable.subarray(header.nameLength + header.extraLength));
  const name = utf8 ? decodeUtf8(rawName) : decodeCp437(rawName);
  const method = classifyMethod(header.method, unsupportedReason(header, extra));

  if (
    (method.kind !== 'unsupported' || method.reason === 'method' || method.reason === 'encryption') &&
    header.offset + LOCAL_HEADER_SIZE > directoryOffset
  ) {
    throw new ZipFormatError('ZIP_OUT_OF_RANGE', `Local header offset of entry ${index} lies beyond the entry data area`, {
      entryName: name,
      offset: recordOffset,
      context: {
        localHeaderOffset: String(header.offset),
        directoryOffset: String(directoryOffset)
      }
    });
  }

  return Object.freeze({
    index,
    name,
    rawName,
    nameEncoding: utf8 ? 'utf8' : 'cp437',
    method,
    methodCode: header.method,
    flags: header.flags,
    crc32: header.crc32,
    compressedSize: header.compressedSize,
    uncompressedSize: header.uncompressedSize,
    offset: header.offset,
    dosTime: header.dosTime,
    dosDate: header.dosDate,
    mtime: dosToDate(header.dosTime, header.dosDate),
    versionMadeBy: header.versionMadeBy,
    versionNeeded: header.versionNeeded,
    diskStart: header.diskStart,
    internalAttributes: header.internalAttributes,
    externalAttributes: header.externalAttributes,
    extra,
    rawComment,
    comment: utf8 ? decodeUtf8(rawComment) : decodeCp437(rawComment),
    isDirectory: rawName.length > 0 && rawName[rawName.length - 1] === 0x2f,
    hasDataDescriptor: (header.flags & FLAG_DATA_DESCRIPTOR) !== 0,
    encrypted: (header.flags & FLAG_ENCRYPTED) !== 0
  } satisfies ZipEntry);
}

/** The archive comment has no encoding flag: UTF-8 when it decodes as such, else CP437. */
function decodeArchiveComment(bytes: Uint8Array): string {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return decodeCp437(bytes);
  }
}

function unsupportedReason(
  header: Pick<CentralHeaderPrefix, 'flags' | 'compressedSize' | 'uncompressedSize' | 'offset' | 'diskStart'>,
  extra: Uint8Array
): ZipUnsupportedReason | undefined {
  if (
    header.compressedSize === UINT32_MAX ||
    header.uncompressedSize === UINT32_MAX ||
    header.offset === UINT32_MAX ||
    header.diskStart === UINT16_MAX ||
    hasZip64Extra(extra)
  ) {
    return 'zip64';
  }
  if ((header.flags & FLAG_ENCRYPTED) !== 0) return 'encryption';
  if (header.diskStart !== 0) return 'multi-disk';
  return undefined;
}

/** Sequential reader over the directory region, fetching 64 KiB at a time. */
class DirectoryCursor {
  private buffer: Uint8Array = new Uint8Array(0);
  private ptr = 0;
  private position: number;
  private unread: number;
  offset: number;

  constructor(
    private readonly reader: RandomAccess,
    start: number,
    private readonly size: number
  ) {
    this.position = start;
    this.offset = start;
    this.unread = size;
  }

  /** Bytes of the region not yet consumed by `take`. */
  get remaining(): number {
    return this.unread + (this.buffer.length - this.ptr);
  }

  async take(length: number, index: number, entryCount: number): Promise<Uint8Array> {
    if (length > this.remaining) {
      throw new ZipFormatError(
        'ZIP_BAD_CENTRAL_DIRECTORY',
        `Central directory of ${this.size} bytes ends inside record ${index} of ${entryCount}`,
        { offset: this.offset }
      );
    }
    while (this.buffer.length - this.ptr < length) {
      const toRead = Math.min(READ_CHUNK_SIZE, this.unread);
      const chunk = await this.reader.read(this.position, toRead);
      if (chunk.length === 0) {
        throw new ZipFormatError('ZIP_TRUNCATED', 'Central directory truncated', { offset: this.position });
      }
      this.position += chunk.length;
      this.unread -= chunk.length;
      const leftover = this.buffer.subarray(this.ptr);
      const merged = new Uint8Array(leftover.length + chunk.length);
      merged.set(leftover, 0);
      merged.set(chunk, leftover.length);
      this.buffer = merged;
      this.ptr = 0;
    }
    const out = this.buffer.subarray(this.ptr, this.ptr + length);
    this.ptr += length;
    this.offset += length;
    return out;
  }
}
