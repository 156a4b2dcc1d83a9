import { UINT32_MAX, bytesEqual } from '../binary.js';
import { ZipFormatError, ZipUnsupportedError, type ZipWarning } from '../errors.js';
import { hasZip64Extra } from '../extraFields.js';
import {
  DATA_DESCRIPTOR_SIZE,
  FLAG_DATA_DESCRIPTOR,
  FLAG_ENCRYPTED,
  LOCAL_HEADER_SIZE,
  parseDataDescriptor,
  parseLocalHeader,
  type DataDescriptor,
  type LocalHeaderPrefix
} from '../records.js';
import type { ZipEntry } from '../types.js';
import { readFully, type RandomAccess } from './RandomAccess.js';

export interface LocalHeaderInfo {
  header: LocalHeaderPrefix;
  name: Uint8Array;
  extra: Uint8Array;
  /** First byte of the entry's compressed data. */
  dataOffset: number;
}

/**
 * Read an entry's local header and check it against the directory copy.
 * `limit` is the first byte past the entry data area (the directory offset).
 */
export async function readLocalHeader(
  reader: RandomAccess,
  entry: ZipEntry,
  limit: number,
  onWarning?: (warning: ZipWarning) => void
): Promise<LocalHeaderInfo> {
  const fixed = await readFully(reader, entry.offset, LOCAL_HEADER_SIZE);
  if (fixed.length < LOCAL_HEADER_SIZE) {
    throw new ZipFormatError('ZIP_TRUNCATED', 'Local file header truncated', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  const header = parseLocalHeader(fixed);
  if (!header) {
    throw new ZipFormatError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', {
      entryName: entry.name,
      offset: entry.offset
    });
  }

  const variableLength = header.nameLength + header.extraLength;
  const dataOffset = entry.offset + LOCAL_HEADER_SIZE + variableLength;
  if (dataOffset > limit) {
    throw new ZipFormatError('ZIP_OUT_OF_RANGE', 'Local file header runs into the central directory', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  const variable = await readFully(reader, entry.offset + LOCAL_HEADER_SIZE, variableLength);
  if (variable.length < variableLength) {
    throw new ZipFormatError('ZIP_TRUNCATED', 'Local file header truncated', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  const name = variable.subarray(0, header.nameLength);
  const extra = variable.subarray(header.nameLength);

  checkAgainstDirectory(entry, header, name);

  if (header.compressedSize === UINT32_MAX || header.uncompressedSize === UINT32_MAX || hasZip64Extra(extra)) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ZIP64', 'Local header declares ZIP64 sizes', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  if ((header.flags & FLAG_ENCRYPTED) !== 0) {
    throw new ZipUnsupportedError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  if (header.extraLength !== entry.extra.length) {
    onWarning?.({
      code: 'ZIP_EXTRA_LENGTH_MISMATCH',
      message: `Local extra field is ${header.extraLength} bytes, central copy is ${entry.extra.length}`,
      entryName: entry.name
    });
  }

  return { header, name, extra, dataOffset };
}

function checkAgainstDirectory(entry: ZipEntry, header: LocalHeaderPrefix, name: Uint8Array): void {
  const mismatch = (field: string, local: number | string, central: number | string): ZipFormatError =>
    new ZipFormatError('ZIP_HEADER_MISMATCH', `Local header ${field} differs from the central directory`, {
      entryName: entry.name,
      offset: entry.offset,
      context: { field, local: String(local), central: String(central) }
    });

  if (!bytesEqual(name, entry.rawName)) {
    throw mismatch('name', name.length, entry.rawName.length);
  }
  if (header.method !== entry.methodCode) {
    throw mismatch('method', header.method, entry.methodCode);
  }
  // With a data descriptor the local fields may be zero; otherwise they must agree.
  const deferred = (header.flags & FLAG_DATA_DESCRIPTOR) !== 0;
  const fields: [string, number, number][] = [
    ['crc32', header.crc32, entry.crc32],
    ['compressedSize', header.compressedSize, entry.compressedSize],
    ['uncompressedSize', header.uncompressedSize, entry.uncompressedSize]
  ];
  for (const [field, local, central] of fields) {
    if (local === UINT32_MAX && field !== 'crc32') continue;
    if (local === central) continue;
    if (deferred && local === 0) continue;
    throw mismatch(field, local, central);
  }
}

/**
 * Read the data descriptor that follows an entry's compressed bytes and check
 * it against the directory. Both the signed and unsigned forms are accepted.
 */
export async function verifyDataDescriptor(
  reader: RandomAccess,
  entry: ZipEntry,
  descriptorOffset: number,
  limit: number
): Promise<DataDescriptor> {
  const available = Math.min(DATA_DESCRIPTOR_SIZE, limit - descriptorOffset);
  const bytes = available > 0 ? await readFully(reader, descriptorOffset, available) : new Uint8Array(0);
  if (bytes.length < available) {
    throw new ZipFormatError('ZIP_TRUNCATED', 'Data descriptor truncated', {
      entryName: entry.name,
      offset: descriptorOffset
    });
  }
  const signed = parseDataDescriptor(bytes);
  if (signed && matchesEntry(signed.descriptor, entry)) return signed.descriptor;
  // A CRC that happens to equal the descriptor signature: retry as unsigned.
  const unsigned = signed?.signed ? parseDataDescriptor(bytes.subarray(0, 12)) : null;
  if (unsigned && matchesEntry(unsigned.descriptor, entry)) return unsigned.descriptor;
  if (!signed) {
    throw new ZipFormatError('ZIP_BAD_DESCRIPTOR', 'Data descriptor does not fit before the central directory', {
      entryName: entry.name,
      offset: descriptorOffset
    });
  }
  throw new ZipFormatError('ZIP_BAD_DESCRIPTOR', 'Data descriptor differs from the central directory', {
    entryName: entry.name,
    offset: descriptorOffset,
    context: {
      crc32: String(signed.descriptor.crc32),
      compressedSize: String(signed.descriptor.compressedSize),
      uncompressedSize: String(signed.descriptor.uncompressedSize)
    }
  });
}

function matchesEntry(descriptor: DataDescriptor, entry: ZipEntry): boolean {
  return (
    descriptor.crc32 === entry.crc32 &&
    descriptor.compressedSize === entry.compressedSize &&
    descriptor.uncompressedSize === entry.uncompressedSize
  );
}
