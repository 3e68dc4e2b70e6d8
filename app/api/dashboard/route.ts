import { NextResponse } from 'next/server';
import { apiHandler } from '@/lib/api/route-handler';
import { getDashboardContext } from '@/lib/dashboard-store';
import { DEFAULT_FEATURE, FEATURE_OPTIONS } from '@/lib/features';
import type { DashboardOverview } from '@/lib/types';

export const dynamic = 'force-dynamic';

/**
 * GET /api/dashboard - summary cards, dropdown options and summary tables.
 * Everything here is computed once at startup.
 */
export const GET = apiHandler(async () => {
  const context = await getDashboardContext();

  const body: DashboardOverview = {
    summary: context.summary,
    features: FEATURE_OPTIONS,
    defaultFeature: DEFAULT_FEATURE,
    ageGroupRates: context.ageGroupRates,
    weekdayRates: context.weekdayRates,
    dataQuality: context.dataQuality,
    source: context.source,
  };

  return NextResponse.json(body);
});
