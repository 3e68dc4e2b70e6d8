/**
 * Flattens chart specs into the row shape recharts consumes:
 * one object per x-axis category, one property per series.
 */

import type {
  BoxPlotSpec,
  GroupedBarSpec,
  OverlayHistogramSpec,
  RateBarSpec,
} from './types/chart';

export type ChartCell = string | number | null | [number, number];

export type ChartRow = Record<string, ChartCell>;

function trimNumber(value: number): string {
  return String(Number(value.toFixed(2)));
}

export function formatBinLabel(start: number, end: number): string {
  return `${trimNumber(start)}–${trimNumber(end)}`;
}

export function histogramRows(spec: OverlayHistogramSpec): ChartRow[] {
  return spec.bins.map((bin) => {
    const row: ChartRow = { label: formatBinLabel(bin.start, bin.end), start: bin.start, end: bin.end };
    for (const s of spec.series) row[s.key] = bin.counts[s.key] ?? 0;
    return row;
  });
}

export function groupedBarRows(spec: GroupedBarSpec): ChartRow[] {
  return spec.groups.map((group) => {
    const row: ChartRow = { category: group.category };
    for (const s of spec.series) row[s.key] = group.counts[s.key] ?? 0;
    return row;
  });
}

export function rateBarRows(spec: RateBarSpec): ChartRow[] {
  return spec.bars.map((bar) => ({
    label: bar.label,
    count: bar.count,
    rate: bar.rate === null ? null : Number(bar.rate.toFixed(2)),
  }));
}

export const boxKeys = (seriesKey: string) => ({
  whisker: `${seriesKey}Whisker`,
  box: `${seriesKey}Box`,
  median: `${seriesKey}Median`,
});

/**
 * Each series becomes a whisker range, an interquartile range and a
 * zero-height median range, rendered as overlaid ranged bars.
 */
export function boxRows(spec: BoxPlotSpec): ChartRow[] {
  return spec.groups.map((group) => {
    const row: ChartRow = { category: group.category };
    for (const s of spec.series) {
      const keys = boxKeys(s.key);
      const stats = group.stats[s.key];
      row[keys.whisker] = stats ? [stats.lowerWhisker, stats.upperWhisker] : null;
      row[keys.box] = stats ? [stats.q1, stats.q3] : null;
      row[keys.median] = stats ? [stats.median, stats.median] : null;
    }
    return row;
  });
}

export type BarGeometry = { x: number; y: number; width: number; height: number };

/** The pixel box recharts passes to a custom bar shape, with height >= 0. */
export function barGeometry(props: unknown): BarGeometry | null {
  if (!props || typeof props !== 'object') return null;
  if (!('x' in props) || !('y' in props) || !('width' in props) || !('height' in props)) return null;
  const { x, y, width, height } = props;
  if (typeof x !== 'number' || typeof y !== 'number' || typeof width !== 'number' || typeof height !== 'number') {
    return null;
  }
  return height < 0 ? { x, y: y + height, width, height: -height } : { x, y, width, height };
}
