import { TransformStream } from 'node:stream/web';

export interface MeasureResult {
  bytes: number;
}

export function createMeasureTransform(result: MeasureResult): TransformStream<Uint8Array, Uint8Array> {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      result.bytes += chunk.length;
      controller.enqueue(chunk);
    }
  });
}
