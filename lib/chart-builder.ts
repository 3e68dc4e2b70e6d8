/**
 * Chart specifications for the dashboard slots.
 *
 * Every builder is a pure function of its inputs and returns a declarative
 * spec the client renders with recharts. Only the main graph depends on the
 * selected feature.
 */

import {
  CATEGORICAL_FEATURE_VALUES,
  NUMERIC_FEATURE_VALUES,
  isNumericFeature,
  type CategoricalFeatureKey,
  type FeatureKey,
  type NumericFeatureKey,
} from './features';
import { DARK_THEME, FLAG_SERIES, NO_SHOW_COLOR, OUTCOME_SERIES } from './chart-theme';
import { WEEKDAYS } from './naive-datetime';
import { binIndex, boxStats, histogramEdges } from './statistics';
import type { AppointmentRecord, Weekday } from './types/appointment';
import type {
  BarGroup,
  BoxGroup,
  BoxPlotSpec,
  ChartSpec,
  GroupedBarSpec,
  HistogramBin,
  OverlayHistogramSpec,
  PieSpec,
  RateBarSpec,
  SeriesSpec,
} from './types/chart';
import type { AgeGroupRate, WeekdayRate } from './types/dashboard';

export const HISTOGRAM_BIN_COUNT = 50;

const OUTCOME_FIELD = 'No-show';
const FLAG_FIELD = 'No-show_flag';
const RATE_FIELD = 'No-show Rate (%)';

function emptyCounts(series: readonly SeriesSpec[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const s of series) counts[s.key] = 0;
  return counts;
}

/**
 * Counts per (category, series) pair. Categories come out in ascending order.
 */
function countGroups(
  records: readonly AppointmentRecord[],
  category: (record: AppointmentRecord) => string,
  seriesKey: (record: AppointmentRecord) => string,
  series: readonly SeriesSpec[],
): BarGroup[] {
  const byCategory = new Map<string, Record<string, number>>();
  for (const record of records) {
    const key = category(record);
    let counts = byCategory.get(key);
    if (!counts) {
      counts = emptyCounts(series);
      byCategory.set(key, counts);
    }
    const s = seriesKey(record);
    counts[s] = (counts[s] ?? 0) + 1;
  }

  return Array.from(byCategory.keys())
    .sort((a, b) => a.localeCompare(b))
    .map((key) => ({ category: key, counts: byCategory.get(key) ?? emptyCounts(series) }));
}

export function buildFeatureHistogram(
  records: readonly AppointmentRecord[],
  feature: NumericFeatureKey,
): OverlayHistogramSpec {
  const value = NUMERIC_FEATURE_VALUES[feature];
  const values = records.map(value);
  const edges = histogramEdges(values, HISTOGRAM_BIN_COUNT);

  let bins: HistogramBin[] = [];
  if (edges) {
    bins = Array.from({ length: edges.binCount }, (_, i) => ({
      start: edges.start + i * edges.width,
      end: edges.start + (i + 1) * edges.width,
      counts: emptyCounts(OUTCOME_SERIES),
    }));
    records.forEach((record, i) => {
      bins[binIndex(edges, values[i])].counts[record.noShow] += 1;
    });
  }

  return {
    kind: 'overlay-histogram',
    title: `Distribution of ${feature} by Attendance`,
    theme: DARK_THEME,
    feature,
    binCount: HISTOGRAM_BIN_COUNT,
    x: { field: feature, title: feature },
    y: { field: 'count', title: 'count' },
    legendTitle: OUTCOME_FIELD,
    series: OUTCOME_SERIES,
    bins,
  };
}

export function buildFeatureBarChart(
  records: readonly AppointmentRecord[],
  feature: CategoricalFeatureKey,
): GroupedBarSpec {
  return {
    kind: 'grouped-bar',
    title: `Attendance by ${feature}`,
    theme: DARK_THEME,
    feature,
    x: { field: feature, title: feature },
    y: { field: 'count', title: 'count' },
    legendTitle: OUTCOME_FIELD,
    series: OUTCOME_SERIES,
    groups: countGroups(records, CATEGORICAL_FEATURE_VALUES[feature], (r) => r.noShow, OUTCOME_SERIES),
  };
}

/** Main graph: overlaid histogram for Age / WaitingDays, grouped bars otherwise. */
export function buildFeatureChart(records: readonly AppointmentRecord[], feature: FeatureKey): ChartSpec {
  return isNumericFeature(feature)
    ? buildFeatureHistogram(records, feature)
    : buildFeatureBarChart(records, feature);
}

export function buildOutcomePie(records: readonly AppointmentRecord[]): PieSpec {
  const counts = emptyCounts(OUTCOME_SERIES);
  for (const record of records) counts[record.noShow] += 1;

  return {
    kind: 'pie',
    title: 'Show vs No-Show Distribution',
    theme: DARK_THEME,
    legendTitle: OUTCOME_FIELD,
    slices: OUTCOME_SERIES.map((s) => ({ key: s.key, label: s.label, value: counts[s.key], color: s.color })),
  };
}

function buildFlagBarChart(
  records: readonly AppointmentRecord[],
  title: string,
  field: string,
  category: (record: AppointmentRecord) => string,
): GroupedBarSpec {
  return {
    kind: 'grouped-bar',
    title,
    theme: DARK_THEME,
    feature: null,
    x: { field, title: field },
    y: { field: 'count', title: 'count' },
    legendTitle: FLAG_FIELD,
    series: FLAG_SERIES,
    groups: countGroups(records, category, (r) => String(r.noShowFlag), FLAG_SERIES),
  };
}

export function buildGenderChart(records: readonly AppointmentRecord[]): GroupedBarSpec {
  return buildFlagBarChart(records, 'Attendance by Gender (0=Show, 1=No-show)', 'Gender', (r) => r.gender);
}

export function buildSmsChart(records: readonly AppointmentRecord[]): GroupedBarSpec {
  return buildFlagBarChart(
    records,
    'Attendance by SMS Received (0=Show, 1=No-show)',
    'SMS_received_label',
    (r) => r.smsReceivedLabel,
  );
}

/** Waiting days per appointment weekday, one box per outcome. Empty weekdays are left out. */
export function buildWaitingDaysBoxPlot(records: readonly AppointmentRecord[]): BoxPlotSpec {
  const samples = new Map<Weekday, Record<string, number[]>>();
  for (const record of records) {
    let byOutcome = samples.get(record.appointmentWeekday);
    if (!byOutcome) {
      byOutcome = { No: [], Yes: [] };
      samples.set(record.appointmentWeekday, byOutcome);
    }
    byOutcome[record.noShow].push(record.waitingDays);
  }

  const groups: BoxGroup[] = [];
  for (const weekday of WEEKDAYS) {
    const byOutcome = samples.get(weekday);
    if (!byOutcome) continue;
    const stats: BoxGroup['stats'] = {};
    for (const s of OUTCOME_SERIES) stats[s.key] = boxStats(byOutcome[s.key] ?? []);
    groups.push({ category: weekday, stats });
  }

  return {
    kind: 'box',
    title: 'Waiting Days by Appointment Day of the Week',
    theme: DARK_THEME,
    x: { field: 'AppointmentDayOfWeek', title: 'AppointmentDayOfWeek' },
    y: { field: 'WaitingDays', title: 'WaitingDays' },
    legendTitle: OUTCOME_FIELD,
    series: OUTCOME_SERIES,
    groups,
  };
}

export function buildAgeGroupRateChart(ageGroupRates: readonly AgeGroupRate[]): RateBarSpec {
  return {
    kind: 'rate-bar',
    title: 'No-Show Rate by Age Group',
    theme: DARK_THEME,
    x: { field: 'Age_Group', title: 'Age_Group' },
    y: { field: RATE_FIELD, title: RATE_FIELD },
    color: NO_SHOW_COLOR,
    bars: ageGroupRates.map((row) => ({ label: row.label, count: row.count, rate: row.rate })),
  };
}

export function buildWeekdayRateChart(weekdayRates: readonly WeekdayRate[]): RateBarSpec {
  return {
    kind: 'rate-bar',
    title: 'No-Show Rate by Day of the Week',
    theme: DARK_THEME,
    x: { field: 'AppointmentDayOfWeek', title: 'AppointmentDayOfWeek' },
    y: { field: RATE_FIELD, title: RATE_FIELD },
    color: NO_SHOW_COLOR,
    bars: weekdayRates.map((row) => ({ label: row.weekday, count: row.count, rate: row.rate })),
  };
}
