/**
 * Reducer from the selected feature to every chart slot.
 *
 * Only `main-graph` reads the feature. The other slots are built from the
 * context alone, so switching features re-emits them unchanged.
 */

import {
  buildAgeGroupRateChart,
  buildFeatureChart,
  buildGenderChart,
  buildOutcomePie,
  buildSmsChart,
  buildWaitingDaysBoxPlot,
  buildWeekdayRateChart,
} from './chart-builder';
import type { FeatureKey } from './features';
import type { ChartId, ChartSpec } from './types/chart';
import type { DashboardCharts, DashboardContext } from './types/dashboard';

export type FeatureIndependentChartId = Exclude<ChartId, 'main-graph'>;

export const FEATURE_INDEPENDENT_CHART_IDS: readonly FeatureIndependentChartId[] = [
  'target-distribution',
  'gender-impact-graph',
  'sms-impact-graph',
  'waitingdays-by-day',
  'age-group-rate-graph',
  'day-of-week-rate-graph',
];

export function buildFeatureIndependentCharts(
  context: DashboardContext,
): Record<FeatureIndependentChartId, ChartSpec> {
  return {
    'target-distribution': buildOutcomePie(context.records),
    'gender-impact-graph': buildGenderChart(context.records),
    'sms-impact-graph': buildSmsChart(context.records),
    'waitingdays-by-day': buildWaitingDaysBoxPlot(context.records),
    'age-group-rate-graph': buildAgeGroupRateChart(context.ageGroupRates),
    'day-of-week-rate-graph': buildWeekdayRateChart(context.weekdayRates),
  };
}

export function buildDashboardCharts(context: DashboardContext, feature: FeatureKey): DashboardCharts {
  return {
    'main-graph': buildFeatureChart(context.records, feature),
    ...buildFeatureIndependentCharts(context),
  };
}
