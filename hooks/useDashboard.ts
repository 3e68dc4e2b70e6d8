'use client';

import { useCallback, useEffect, useState } from 'react';
import { fetchDashboardCharts, fetchDashboardOverview } from '@/lib/dashboard-client';
import { DEFAULT_FEATURE, type FeatureKey } from '@/lib/features';
import type { DashboardCharts, DashboardOverview } from '@/lib/types';

function errorMessage(e: unknown, fallback: string): string {
  return e instanceof Error && e.message ? e.message : fallback;
}

/** Summary cards and summary tables; loaded once per page view. */
export function useDashboardOverview() {
  const [overview, setOverview] = useState<DashboardOverview | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let active = true;
    const load = async () => {
      try {
        const data = await fetchDashboardOverview();
        if (active) setOverview(data);
      } catch (e) {
        console.error('Error loading dashboard overview:', e);
        if (active) setError(errorMessage(e, 'Failed to load the dashboard'));
      } finally {
        if (active) setLoading(false);
      }
    };
    void load();
    return () => {
      active = false;
    };
  }, []);

  return { overview, loading, error };
}

/**
 * Selected feature + the chart specs it produces.
 * A selection made while a request is in flight is ignored, so every change
 * completes before the next one is accepted.
 */
export function useDashboardCharts(initialFeature: FeatureKey = DEFAULT_FEATURE) {
  const [feature, setFeature] = useState<FeatureKey>(initialFeature);
  const [charts, setCharts] = useState<DashboardCharts | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let active = true;
    const load = async () => {
      setLoading(true);
      setError(null);
      try {
        const data = await fetchDashboardCharts(feature);
        if (active) setCharts(data.charts);
      } catch (e) {
        console.error('Error loading charts:', e);
        if (active) setError(errorMessage(e, 'Failed to load charts'));
      } finally {
        if (active) setLoading(false);
      }
    };
    void load();
    return () => {
      active = false;
    };
  }, [feature]);

  const selectFeature = useCallback(
    (next: FeatureKey) => {
      if (loading) return;
      setFeature(next);
    },
    [loading],
  );

  return { feature, charts, loading, error, selectFeature };
}
