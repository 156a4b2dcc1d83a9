/**
 * Positional byte source. `read` may return fewer than `length` bytes only at
 * end of input; every call is independent of the previous one.
 */
export interface RandomAccess {
  size(): Promise<number>;
  read(offset: number, length: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export class BufferRandomAccess implements RandomAccess {
  constructor(private readonly data: Uint8Array) {}

  async size(): Promise<number> {
    return this.data.length;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (length <= 0 || offset >= this.data.length) return new Uint8Array(0);
    const end = Math.min(this.data.length, offset + length);
    return this.data.subarray(offset, end);
  }

  async close(): Promise<void> {
    return;
  }
}

/** Read exactly `length` bytes, looping over short reads; a shorter result means end of input. */
export async function readFully(source: RandomAccess, offset: number, length: number): Promise<Uint8Array> {
  const first = await source.read(offset, length);
  if (first.length >= length || first.length === 0) return first;
  const out = new Uint8Array(length);
  out.set(first);
  let filled = first.length;
  while (filled < length) {
    const chunk = await source.read(offset + filled, length - filled);
    if (chunk.length === 0) break;
    out.set(chunk, filled);
    filled += chunk.length;
  }
  return filled === length ? out : out.subarray(0, filled);
}
