'use client';

import { useDashboardCharts, useDashboardOverview } from '@/hooks/useDashboard';
import { ChartSlot } from './charts/ChartSlot';
import { DataQualityNotice } from './DataQualityNotice';
import { FeatureSelect } from './FeatureSelect';
import { SummaryCards } from './SummaryCards';

export function AppointmentDashboard() {
  const { overview, loading: overviewLoading, error: overviewError } = useDashboardOverview();
  const { feature, charts, loading: chartsLoading, error: chartsError, selectFeature } = useDashboardCharts();

  if (overviewLoading) {
    return (
      <div className="card text-center py-12">
        <p className="text-gray-300">Loading appointment data...</p>
      </div>
    );
  }

  if (overviewError || !overview) {
    return (
      <div className="card border border-red-500/40 text-center py-12">
        <p className="text-red-400">{overviewError ?? 'Dashboard data is unavailable'}</p>
      </div>
    );
  }

  return (
    <div className="space-y-6">
      <SummaryCards summary={overview.summary} />
      <DataQualityNotice report={overview.dataQuality} />

      <div className="grid grid-cols-1 lg:grid-cols-12 gap-6">
        <div className="lg:col-span-4">
          <FeatureSelect
            options={overview.features}
            value={feature}
            onChange={selectFeature}
            disabled={chartsLoading}
          />
        </div>
      </div>

      {chartsError && (
        <div className="card border border-red-500/40">
          <p className="text-red-400">{chartsError}</p>
        </div>
      )}

      <div className="grid grid-cols-1 lg:grid-cols-12 gap-6">
        <div className="lg:col-span-7">
          <ChartSlot id="main-graph" spec={charts?.['main-graph']} />
        </div>
        <div className="lg:col-span-5">
          <ChartSlot id="target-distribution" spec={charts?.['target-distribution']} />
        </div>
      </div>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <ChartSlot id="gender-impact-graph" spec={charts?.['gender-impact-graph']} />
        <ChartSlot id="sms-impact-graph" spec={charts?.['sms-impact-graph']} />
      </div>

      <ChartSlot id="waitingdays-by-day" spec={charts?.['waitingdays-by-day']} />

      <h2 className="text-2xl font-semibold text-white text-center pt-4">Additional Insights</h2>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
        <ChartSlot id="age-group-rate-graph" spec={charts?.['age-group-rate-graph']} />
        <ChartSlot id="day-of-week-rate-graph" spec={charts?.['day-of-week-rate-graph']} />
      </div>

      <p className="text-xs text-gray-500 text-center">
        {overview.source.rawRowCount.toLocaleString('en-US')} rows loaded from {overview.source.url} at {overview.source.loadedAt}
      </p>
    </div>
  );
}
