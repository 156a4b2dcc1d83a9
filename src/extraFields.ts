import { readUint16LE } from './binary.js';

/** Header id of the ZIP64 extended information extra field (APPNOTE 4.5.3). */
export const ZIP64_EXTRA_ID = 0x0001;

export interface ExtraField {
  id: number;
  data: Uint8Array;
}

/**
 * Split an extra-field block into `(id, data)` records. A trailing record
 * whose declared length overruns the block is dropped; the block itself is
 * kept verbatim by callers, so nothing is lost.
 */
export function parseExtraFields(extra: Uint8Array): ExtraField[] {
  const fields: ExtraField[] = [];
  let offset = 0;
  while (offset + 4 <= extra.length) {
    const id = readUint16LE(extra, offset);
    const size = readUint16LE(extra, offset + 2);
    const dataStart = offset + 4;
    const dataEnd = dataStart + size;
    if (dataEnd > extra.length) {
      break;
    }
    fields.push({ id, data: extra.subarray(dataStart, dataEnd) });
    offset = dataEnd;
  }
  return fields;
}

export function hasZip64Extra(extra: Uint8Array): boolean {
  return parseExtraFields(extra).some((field) => field.id === ZIP64_EXTRA_ID);
}
