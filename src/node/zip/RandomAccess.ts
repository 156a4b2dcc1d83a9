import { open } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { RandomAccess } from '../../reader/RandomAccess.js';

export class FileRandomAccess implements RandomAccess {
  private readonly handlePromise: ReturnType<typeof open>;

  constructor(private readonly path: string) {
    this.handlePromise = open(this.path, 'r');
    // Open failures surface from the first awaiting call.
    this.handlePromise.catch(() => undefined);
  }

  async size(): Promise<number> {
    const handle = await this.handlePromise;
    const stat = await handle.stat();
    return stat.size;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    if (length <= 0) return new Uint8Array(0);
    const handle = await this.handlePromise;
    const buffer = new Uint8Array(length);
    const { bytesRead } = await handle.read(buffer, 0, length, offset);
    if (bytesRead === length) return buffer;
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    const handle = await this.handlePromise;
    await handle.close();
  }

  static fromPath(path: string | URL): FileRandomAccess {
    const filePath = typeof path === 'string' ? path : fileURLToPath(path);
    return new FileRandomAccess(filePath);
  }
}
