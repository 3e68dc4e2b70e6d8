import type { BoxStats } from './types/chart';

/** Linear-interpolated quantile of an ascending array. */
export function quantile(sorted: readonly number[], q: number): number {
  const k = (sorted.length - 1) * q;
  const f = Math.floor(k);
  const d = k - f;
  return f + 1 < sorted.length ? sorted[f] * (1 - d) + sorted[f + 1] * d : sorted[f];
}

/**
 * Box-plot statistics with whiskers at the furthest points within 1.5 x IQR.
 * Returns null for an empty sample.
 */
export function boxStats(values: readonly number[]): BoxStats | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const lowFence = q1 - 1.5 * iqr;
  const highFence = q3 + 1.5 * iqr;

  let lowerWhisker = q1;
  let upperWhisker = q3;
  let outliers = 0;
  let sum = 0;
  for (const v of sorted) {
    sum += v;
    if (v < lowFence || v > highFence) {
      outliers += 1;
      continue;
    }
    if (v < lowerWhisker) lowerWhisker = v;
    if (v > upperWhisker) upperWhisker = v;
  }

  return {
    count: sorted.length,
    min: sorted[0],
    q1,
    median: quantile(sorted, 0.5),
    q3,
    max: sorted[sorted.length - 1],
    mean: sum / sorted.length,
    lowerWhisker,
    upperWhisker,
    outliers,
  };
}

export type HistogramEdges = { start: number; width: number; binCount: number };

/**
 * Equal-width bins over [min, max]; the last bin is closed so max lands in it.
 * A constant sample gets a single bin of width 1.
 */
export function histogramEdges(values: readonly number[], binCount: number): HistogramEdges | null {
  if (values.length === 0) return null;

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }

  if (min === max) return { start: min, width: 1, binCount: 1 };
  return { start: min, width: (max - min) / binCount, binCount };
}

export function binIndex(edges: HistogramEdges, value: number): number {
  const i = Math.floor((value - edges.start) / edges.width);
  return Math.min(edges.binCount - 1, Math.max(0, i));
}
