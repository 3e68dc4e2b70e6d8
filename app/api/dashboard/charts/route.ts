import { NextResponse } from 'next/server';
import { apiHandler } from '@/lib/api/route-handler';
import { HttpError } from '@/lib/api-error-handler';
import { buildDashboardCharts } from '@/lib/dashboard-reducer';
import { getDashboardContext } from '@/lib/dashboard-store';
import { DEFAULT_FEATURE, featureKeySchema } from '@/lib/features';
import type { DashboardChartsResponse } from '@/lib/types';

export const dynamic = 'force-dynamic';

/**
 * GET /api/dashboard/charts?feature=Age - chart specs for every slot.
 */
export const GET = apiHandler(async (req) => {
  const requested = req.nextUrl.searchParams.get('feature') ?? DEFAULT_FEATURE;
  const parsed = featureKeySchema.safeParse(requested);
  if (!parsed.success) {
    throw new HttpError(400, `Unknown feature "${requested}"`, 'INVALID_FEATURE');
  }

  const feature = parsed.data;
  const context = await getDashboardContext();

  const body: DashboardChartsResponse = {
    feature,
    charts: buildDashboardCharts(context, feature),
  };

  return NextResponse.json(body);
});
