import type { ZipLimits } from './types.js';

export const DEFAULT_LIMITS: Required<ZipLimits> = Object.freeze({
  maxEntries: 0xffff,
  maxUncompressedEntryBytes: 0xfffffffe,
  maxCompressionRatio: Infinity
});

export function normalizeLimits(limits?: ZipLimits, defaults: Required<ZipLimits> = DEFAULT_LIMITS): Required<ZipLimits> {
  return {
    maxEntries: finiteOr(limits?.maxEntries, defaults.maxEntries),
    maxUncompressedEntryBytes: finiteOr(limits?.maxUncompressedEntryBytes, defaults.maxUncompressedEntryBytes),
    maxCompressionRatio:
      limits?.maxCompressionRatio === Infinity
        ? Infinity
        : finiteOr(limits?.maxCompressionRatio, defaults.maxCompressionRatio)
  };
}

function finiteOr(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(0, value);
}
