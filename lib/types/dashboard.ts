import type { AppointmentRecord, Weekday } from './appointment';
import type { FeatureKey } from '../features';
import type { ChartSpec, ChartId } from './chart';

export type AgeGroupRate = {
  label: string;
  /** Inclusive lower edge; the overflow row has no upper edge. */
  lower: number;
  upper: number | null;
  count: number;
  /** Mean no-show flag x 100; null when the bucket is empty. */
  rate: number | null;
};

export type WeekdayRate = {
  weekday: Weekday;
  count: number;
  rate: number | null;
};

export type SummaryCards = {
  totalAppointments: number;
  averageAge: number | null;
  showRate: number | null;
  noShowRate: number | null;
  formatted: {
    totalAppointments: string;
    averageAge: string;
    showRate: string;
    noShowRate: string;
  };
};

export type DataQualityReport = {
  droppedNegativeAge: number;
  negativeWaitingDays: number;
  ageOverflow: number;
  warnings: string[];
};

export type DatasetSource = {
  url: string;
  loadedAt: string;
  rawRowCount: number;
};

export interface DashboardContext {
  readonly records: readonly AppointmentRecord[];
  readonly ageGroupRates: readonly AgeGroupRate[];
  readonly weekdayRates: readonly WeekdayRate[];
  readonly summary: SummaryCards;
  readonly dataQuality: DataQualityReport;
  readonly source: DatasetSource;
}

export type FeatureOption = { value: FeatureKey; label: string };

export type DashboardOverview = {
  summary: SummaryCards;
  features: FeatureOption[];
  defaultFeature: FeatureKey;
  ageGroupRates: readonly AgeGroupRate[];
  weekdayRates: readonly WeekdayRate[];
  dataQuality: DataQualityReport;
  source: DatasetSource;
};

export type DashboardCharts = Readonly<Record<ChartId, ChartSpec>>;

export type DashboardChartsResponse = {
  feature: FeatureKey;
  charts: DashboardCharts;
};
