import type { ChartTheme, SeriesSpec } from './types/chart';

export const NO_SHOW_COLOR = '#FF9500';
export const SHOW_COLOR = '#007AFF';

export const DARK_THEME: ChartTheme = {
  titleFontColor: 'white',
  titleFontSize: 24,
  fontColor: 'white',
  axisTitleFontColor: 'white',
  axisTitleFontSize: 18,
  plotBackground: '#2c3e50',
  paperBackground: '#1E1E1E',
  showGrid: true,
};

/** Series keyed by the `No-show` label: attended first. */
export const OUTCOME_SERIES: SeriesSpec[] = [
  { key: 'No', label: 'No', color: SHOW_COLOR },
  { key: 'Yes', label: 'Yes', color: NO_SHOW_COLOR },
];

/** Series keyed by the numeric no-show flag. */
export const FLAG_SERIES: SeriesSpec[] = [
  { key: '0', label: '0', color: SHOW_COLOR },
  { key: '1', label: '1', color: NO_SHOW_COLOR },
];
