const TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i;
    for (let k = 0; k < 8; k += 1) {
      if ((c & 1) !== 0) {
        c = 0xedb88320 ^ (c >>> 1);
      } else {
        c = c >>> 1;
      }
    }
    table[i] = c >>> 0;
  }
  return table;
})();

/** Incremental CRC-32 (IEEE 802.3, reflected polynomial 0xEDB88320). */
export class Crc32 {
  private value: number = 0xffffffff;

  update(chunk: Uint8Array): void {
    this.value = crc32(chunk, this.value);
  }

  digest(): number {
    return (this.value ^ 0xffffffff) >>> 0;
  }
}

/**
 * Raw table update. `seed` is the pre-conditioned register, so callers that
 * start from scratch keep the default and invert the result themselves.
 */
export function crc32(chunk: Uint8Array, seed = 0xffffffff): number {
  let crc = seed >>> 0;
  for (let i = 0; i < chunk.length; i += 1) {
    crc = TABLE[(crc ^ chunk[i]!) & 0xff]! ^ (crc >>> 8);
  }
  return crc >>> 0;
}

/**
 * Continue a finished CRC-32 over more bytes.
 *
 * `updateCrc32(0, data)` is the checksum of `data`, and
 * `updateCrc32(updateCrc32(0, a), b)` equals the checksum of `a` followed by `b`.
 */
export function updateCrc32(runningCrc: number, chunk: Uint8Array): number {
  return (crc32(chunk, (runningCrc ^ 0xffffffff) >>> 0) ^ 0xffffffff) >>> 0;
}
