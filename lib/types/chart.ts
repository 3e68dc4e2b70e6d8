import type { NumericFeatureKey, CategoricalFeatureKey } from '../features';
import type { Weekday } from './appointment';

export const CHART_IDS = [
  'main-graph',
  'target-distribution',
  'gender-impact-graph',
  'sms-impact-graph',
  'waitingdays-by-day',
  'age-group-rate-graph',
  'day-of-week-rate-graph',
] as const;

export type ChartId = (typeof CHART_IDS)[number];

export type ChartTheme = {
  titleFontColor: string;
  titleFontSize: number;
  fontColor: string;
  axisTitleFontColor: string;
  axisTitleFontSize: number;
  plotBackground: string;
  paperBackground: string;
  showGrid: boolean;
};

export type AxisSpec = {
  field: string;
  title: string;
};

export type SeriesSpec = {
  key: string;
  label: string;
  color: string;
};

type ChartSpecBase = {
  title: string;
  theme: ChartTheme;
};

export type HistogramBin = {
  start: number;
  end: number;
  counts: Record<string, number>;
};

export type OverlayHistogramSpec = ChartSpecBase & {
  kind: 'overlay-histogram';
  feature: NumericFeatureKey;
  binCount: number;
  x: AxisSpec;
  y: AxisSpec;
  legendTitle: string;
  series: SeriesSpec[];
  bins: HistogramBin[];
};

export type BarGroup = {
  category: string;
  counts: Record<string, number>;
};

export type GroupedBarSpec = ChartSpecBase & {
  kind: 'grouped-bar';
  feature: CategoricalFeatureKey | null;
  x: AxisSpec;
  y: AxisSpec;
  legendTitle: string;
  series: SeriesSpec[];
  groups: BarGroup[];
};

export type PieSlice = {
  key: string;
  label: string;
  value: number;
  color: string;
};

export type PieSpec = ChartSpecBase & {
  kind: 'pie';
  legendTitle: string;
  slices: PieSlice[];
};

export type BoxStats = {
  count: number;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  mean: number;
  lowerWhisker: number;
  upperWhisker: number;
  outliers: number;
};

export type BoxGroup = {
  category: Weekday;
  stats: Record<string, BoxStats | null>;
};

export type BoxPlotSpec = ChartSpecBase & {
  kind: 'box';
  x: AxisSpec;
  y: AxisSpec;
  legendTitle: string;
  series: SeriesSpec[];
  groups: BoxGroup[];
};

export type RateBar = {
  label: string;
  count: number;
  rate: number | null;
};

export type RateBarSpec = ChartSpecBase & {
  kind: 'rate-bar';
  x: AxisSpec;
  y: AxisSpec;
  color: string;
  bars: RateBar[];
};

export type ChartSpec =
  | OverlayHistogramSpec
  | GroupedBarSpec
  | PieSpec
  | BoxPlotSpec
  | RateBarSpec;
