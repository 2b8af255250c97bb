import type { LatencySummary } from './types.js';

/**
 * Linear-interpolation percentile over an ascending array, using the rank
 * formula `rank = (N - 1) * p + 1` (1-based).
 */
export function percentile(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) {
    throw new RangeError('Cannot compute a percentile of an empty sample');
  }
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`Percentile must be within [0, 1], got ${p}`);
  }

  const rank = (n - 1) * p + 1;
  const k = Math.floor(rank);
  if (k === rank) return sorted[k - 1];

  const d = rank - k;
  return sorted[k - 1] + d * (sorted[k] - sorted[k - 1]);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeLatencies(samples: readonly number[]): LatencySummary {
  const sorted = [...samples].sort((a, b) => a - b);
  const pc = (p: number) => round2(percentile(sorted, p));

  return {
    n: sorted.length,
    p50: pc(0.5),
    p75: pc(0.75),
    p99: pc(0.99),
    p999: pc(0.999),
    max: pc(1),
  };
}
