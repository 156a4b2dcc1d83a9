import { TransformStream } from 'node:stream/web';
import type { ZipProgressEvent, ZipProgressOptions } from '../types.js';

export interface ProgressTracker {
  update(bytesInDelta: number, bytesOutDelta: number): void;
  /** Emit the current totals regardless of throttling. */
  flush(): void;
}

type ProgressBase = Omit<ZipProgressEvent, 'bytesIn' | 'bytesOut'>;

interface Throttle {
  intervalMs: number;
  everyChunks: number;
}

export function createProgressTracker(options: ZipProgressOptions | undefined, base: ProgressBase): ProgressTracker | null {
  if (!options?.onProgress) return null;
  const throttle: Throttle = {
    intervalMs: wholeNumber(options.progressIntervalMs, 50, 0),
    everyChunks: wholeNumber(options.progressChunkInterval, 16, 1)
  };
  return new ThrottledProgressTracker(options.onProgress, base, throttle);
}

/** Pass-through stage that reports each chunk to `tracker`, if any. */
export function createProgressTransform(tracker: ProgressTracker | null): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      tracker?.update(chunk.length, chunk.length);
      controller.enqueue(chunk);
    },
    flush() {
      tracker?.flush();
    }
  });
}

function wholeNumber(value: number | undefined, fallback: number, min: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
}

/** Emits after `everyChunks` updates or `intervalMs`, whichever comes first. */
class ThrottledProgressTracker implements ProgressTracker {
  private totals = { bytesIn: 0, bytesOut: 0 };
  private pendingChunks = 0;
  private emittedAt = 0;

  constructor(
    private readonly onProgress: (event: ZipProgressEvent) => void,
    private readonly base: ProgressBase,
    private readonly throttle: Throttle
  ) {}

  update(bytesInDelta: number, bytesOutDelta: number): void {
    this.totals = {
      bytesIn: this.totals.bytesIn + bytesInDelta,
      bytesOut: this.totals.bytesOut + bytesOutDelta
    };
    this.pendingChunks += 1;
    const now = Date.now();
    if (this.pendingChunks >= this.throttle.everyChunks || now - this.emittedAt >= this.throttle.intervalMs) {
      this.emit(now);
    }
  }

  flush(): void {
    this.emit(Date.now());
  }

  private emit(now: number): void {
    this.emittedAt = now;
    this.pendingChunks = 0;
    this.onProgress({ ...this.base, ...this.totals });
  }
}
