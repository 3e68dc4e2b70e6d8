/**
 * Browser-side fetchers for the dashboard API.
 */

import type { FeatureKey } from './features';
import type { DashboardChartsResponse, DashboardOverview } from './types/dashboard';

export class DashboardRequestError extends Error {
  status: number;
  code?: string;

  constructor(status: number, message: string, code?: string) {
    super(message);
    this.name = 'DashboardRequestError';
    this.status = status;
    this.code = code;
  }
}

type FetchJson = (input: string) => Promise<Pick<Response, 'ok' | 'status' | 'json'>>;

async function readError(res: Pick<Response, 'status' | 'json'>): Promise<DashboardRequestError> {
  let message = `Request failed with status ${res.status}`;
  let code: string | undefined;
  // A non-JSON error body keeps the status message
  const body: unknown = await res.json().catch(() => null);
  if (body && typeof body === 'object') {
    if ('error' in body && typeof body.error === 'string') message = body.error;
    if ('code' in body && typeof body.code === 'string') code = body.code;
  }
  return new DashboardRequestError(res.status, message, code);
}

async function getJson<T>(url: string, fetchImpl: FetchJson): Promise<T> {
  const res = await fetchImpl(url);
  if (!res.ok) throw await readError(res);
  const body: T = await res.json();
  return body;
}

export function fetchDashboardOverview(fetchImpl: FetchJson = fetch): Promise<DashboardOverview> {
  return getJson<DashboardOverview>('/api/dashboard', fetchImpl);
}

export function fetchDashboardCharts(
  feature: FeatureKey,
  fetchImpl: FetchJson = fetch,
): Promise<DashboardChartsResponse> {
  return getJson<DashboardChartsResponse>(
    `/api/dashboard/charts?feature=${encodeURIComponent(feature)}`,
    fetchImpl,
  );
}
