/**
 * The immutable data context every aggregation and chart function reads.
 * Built once from the loaded dataset and passed explicitly, never looked up.
 */

import {
  computeAgeGroupRates,
  computeDataQuality,
  computeSummaryCards,
  computeWeekdayRates,
} from './aggregator';
import type { LoadedDataset } from './dataset-loader';
import type { DashboardContext } from './types/dashboard';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function createDashboardContext(dataset: LoadedDataset): DashboardContext {
  const { records } = dataset;

  return deepFreeze({
    records,
    ageGroupRates: computeAgeGroupRates(records),
    weekdayRates: computeWeekdayRates(records),
    summary: computeSummaryCards(records),
    dataQuality: computeDataQuality(records, dataset.rawRowCount - records.length),
    source: {
      url: dataset.sourceUrl,
      loadedAt: dataset.loadedAt,
      rawRowCount: dataset.rawRowCount,
    },
  });
}
