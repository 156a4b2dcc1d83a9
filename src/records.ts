import { readUint16LE, readUint32LE, writeUint16LE, writeUint32LE } from './binary.js';

export const LOCAL_HEADER_SIGNATURE = 0x04034b50;
export const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
export const DATA_DESCRIPTOR_SIGNATURE = 0x08074b50;
export const EOCD_SIGNATURE = 0x06054b50;

export const LOCAL_HEADER_SIZE = 30;
export const CENTRAL_HEADER_SIZE = 46;
export const EOCD_SIZE = 22;
/** Signed descriptor; the unsigned form is 12 bytes. */
export const DATA_DESCRIPTOR_SIZE = 16;

// General purpose bit flags (APPNOTE 4.4.4).
export const FLAG_ENCRYPTED = 0x0001;
export const FLAG_DATA_DESCRIPTOR = 0x0008;
export const FLAG_UTF8 = 0x0800;

/** Offset of the CRC-32 field inside a local header; CRC and both sizes follow contiguously. */
export const LOCAL_HEADER_CRC_OFFSET = 14;

export interface LocalHeader {
  versionNeeded: number;
  flags: number;
  method: number;
  dosTime: number;
  dosDate: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  name: Uint8Array;
  extra: Uint8Array;
}

export interface CentralHeader extends LocalHeader {
  versionMadeBy: number;
  diskStart: number;
  internalAttributes: number;
  externalAttributes: number;
  offset: number;
  comment: Uint8Array;
}

export interface EocdRecord {
  diskNumber: number;
  directoryDisk: number;
  entriesOnDisk: number;
  entryCount: number;
  directorySize: number;
  directoryOffset: number;
  comment: Uint8Array;
}

export interface DataDescriptor {
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
}

export function encodeLocalHeader(header: LocalHeader): Uint8Array {
  const out = new Uint8Array(LOCAL_HEADER_SIZE + header.name.length + header.extra.length);
  writeUint32LE(out, 0, LOCAL_HEADER_SIGNATURE);
  writeUint16LE(out, 4, header.versionNeeded);
  writeUint16LE(out, 6, header.flags);
  writeUint16LE(out, 8, header.method);
  writeUint16LE(out, 10, header.dosTime);
  writeUint16LE(out, 12, header.dosDate);
  writeUint32LE(out, 14, header.crc32);
  writeUint32LE(out, 18, header.compressedSize);
  writeUint32LE(out, 22, header.uncompressedSize);
  writeUint16LE(out, 26, header.name.length);
  writeUint16LE(out, 28, header.extra.length);
  out.set(header.name, LOCAL_HEADER_SIZE);
  out.set(header.extra, LOCAL_HEADER_SIZE + header.name.length);
  return out;
}

/** Fixed part of a local header plus the lengths of what follows it. */
export interface LocalHeaderPrefix extends Omit<LocalHeader, 'name' | 'extra'> {
  nameLength: number;
  extraLength: number;
}

/**
 * Decode the 30 fixed bytes of a local header. Returns `null` when the buffer
 * is short or does not start with the local header signature.
 */
export function parseLocalHeader(bytes: Uint8Array, offset = 0): LocalHeaderPrefix | null {
  if (bytes.length - offset < LOCAL_HEADER_SIZE) return null;
  if (readUint32LE(bytes, offset) !== LOCAL_HEADER_SIGNATURE) return null;
  return {
    versionNeeded: readUint16LE(bytes, offset + 4),
    flags: readUint16LE(bytes, offset + 6),
    method: readUint16LE(bytes, offset + 8),
    dosTime: readUint16LE(bytes, offset + 10),
    dosDate: readUint16LE(bytes, offset + 12),
    crc32: readUint32LE(bytes, offset + 14),
    compressedSize: readUint32LE(bytes, offset + 18),
    uncompressedSize: readUint32LE(bytes, offset + 22),
    nameLength: readUint16LE(bytes, offset + 26),
    extraLength: readUint16LE(bytes, offset + 28)
  };
}

export function encodeCentralHeader(header: CentralHeader): Uint8Array {
  const variable = header.name.length + header.extra.length + header.comment.length;
  const out = new Uint8Array(CENTRAL_HEADER_SIZE + variable);
  writeUint32LE(out, 0, CENTRAL_HEADER_SIGNATURE);
  writeUint16LE(out, 4, header.versionMadeBy);
  writeUint16LE(out, 6, header.versionNeeded);
  writeUint16LE(out, 8, header.flags);
  writeUint16LE(out, 10, header.method);
  writeUint16LE(out, 12, header.dosTime);
  writeUint16LE(out, 14, header.dosDate);
  writeUint32LE(out, 16, header.crc32);
  writeUint32LE(out, 20, header.compressedSize);
  writeUint32LE(out, 24, header.uncompressedSize);
  writeUint16LE(out, 28, header.name.length);
  writeUint16LE(out, 30, header.extra.length);
  writeUint16LE(out, 32, header.comment.length);
  writeUint16LE(out, 34, header.diskStart);
  writeUint16LE(out, 36, header.internalAttributes);
  writeUint32LE(out, 38, header.externalAttributes);
  writeUint32LE(out, 42, header.offset);
  out.set(header.name, CENTRAL_HEADER_SIZE);
  out.set(header.extra, CENTRAL_HEADER_SIZE + header.name.length);
  out.set(header.comment, CENTRAL_HEADER_SIZE + header.name.length + header.extra.length);
  return out;
}

export interface CentralHeaderPrefix extends Omit<CentralHeader, 'name' | 'extra' | 'comment'> {
  nameLength: number;
  extraLength: number;
  commentLength: number;
}

export function parseCentralHeader(bytes: Uint8Array, offset: number): CentralHeaderPrefix | null {
  if (bytes.length - offset < CENTRAL_HEADER_SIZE) return null;
  if (readUint32LE(bytes, offset) !== CENTRAL_HEADER_SIGNATURE) return null;
  return {
    versionMadeBy: readUint16LE(bytes, offset + 4),
    versionNeeded: readUint16LE(bytes, offset + 6),
    flags: readUint16LE(bytes, offset + 8),
    method: readUint16LE(bytes, offset + 10),
    dosTime: readUint16LE(bytes, offset + 12),
    dosDate: readUint16LE(bytes, offset + 14),
    crc32: readUint32LE(bytes, offset + 16),
    compressedSize: readUint32LE(bytes, offset + 20),
    uncompressedSize: readUint32LE(bytes, offset + 24),
    nameLength: readUint16LE(bytes, offset + 28),
    extraLength: readUint16LE(bytes, offset + 30),
    commentLength: readUint16LE(bytes, offset + 32),
    diskStart: readUint16LE(bytes, offset + 34),
    internalAttributes: readUint16LE(bytes, offset + 36),
    externalAttributes: readUint32LE(bytes, offset + 38),
    offset: readUint32LE(bytes, offset + 42)
  };
}

export function encodeDataDescriptor(descriptor: DataDescriptor): Uint8Array {
  const out = new Uint8Array(DATA_DESCRIPTOR_SIZE);
  writeUint32LE(out, 0, DATA_DESCRIPTOR_SIGNATURE);
  writeUint32LE(out, 4, descriptor.crc32);
  writeUint32LE(out, 8, descriptor.compressedSize);
  writeUint32LE(out, 12, descriptor.uncompressedSize);
  return out;
}

/**
 * Decode a data descriptor in either form. `bytes` should hold 16 bytes when
 * available; only 12 are needed for the unsigned form.
 */
export function parseDataDescriptor(bytes: Uint8Array): { descriptor: DataDescriptor; signed: boolean } | null {
  if (bytes.length >= DATA_DESCRIPTOR_SIZE && readUint32LE(bytes, 0) === DATA_DESCRIPTOR_SIGNATURE) {
    return {
      descriptor: {
        crc32: readUint32LE(bytes, 4),
        compressedSize: readUint32LE(bytes, 8),
        uncompressedSize: readUint32LE(bytes, 12)
      },
      signed: true
    };
  }
  if (bytes.length < 12) return null;
  return {
    descriptor: {
      crc32: readUint32LE(bytes, 0),
      compressedSize: readUint32LE(bytes, 4),
      uncompressedSize: readUint32LE(bytes, 8)
    },
    signed: false
  };
}

export function encodeEocd(record: EocdRecord): Uint8Array {
  const out = new Uint8Array(EOCD_SIZE + record.comment.length);
  writeUint32LE(out, 0, EOCD_SIGNATURE);
  writeUint16LE(out, 4, record.diskNumber);
  writeUint16LE(out, 6, record.directoryDisk);
  writeUint16LE(out, 8, record.entriesOnDisk);
  writeUint16LE(out, 10, record.entryCount);
  writeUint32LE(out, 12, record.directorySize);
  writeUint32LE(out, 16, record.directoryOffset);
  writeUint16LE(out, 20, record.comment.length);
  out.set(record.comment, EOCD_SIZE);
  return out;
}

/** Decode the fixed EOCD fields at `offset`; the comment is sliced only if fully present. */
export function parseEocd(bytes: Uint8Array, offset: number): (EocdRecord & { commentLength: number }) | null {
  if (bytes.length - offset < EOCD_SIZE) return null;
  if (readUint32LE(bytes, offset) !== EOCD_SIGNATURE) return null;
  const commentLength = readUint16LE(bytes, offset + 20);
  const commentStart = offset + EOCD_SIZE;
  return {
    diskNumber: readUint16LE(bytes, offset + 4),
    directoryDisk: readUint16LE(bytes, offset + 6),
    entriesOnDisk: readUint16LE(bytes, offset + 8),
    entryCount: readUint16LE(bytes, offset + 10),
    directorySize: readUint32LE(bytes, offset + 12),
    directoryOffset: readUint32LE(bytes, offset + 16),
    commentLength,
    comment: bytes.subarray(commentStart, Math.min(bytes.length, commentStart + commentLength))
  };
}
