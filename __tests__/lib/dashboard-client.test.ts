import { describe, it, expect, vi } from 'vitest';
import { DashboardRequestError, fetchDashboardCharts, fetchDashboardOverview } from '@/lib/dashboard-client';

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe('fetchDashboardCharts', () => {
  it('requests charts for the feature', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse({ feature: 'SMS_received', charts: {} }));

    const data = await fetchDashboardCharts('SMS_received', fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith('/api/dashboard/charts?feature=SMS_received');
    expect(data.feature).toBe('SMS_received');
  });

  it('raises the server error message and code', async () => {
    const fetchImpl = vi.fn(async () =>
      jsonResponse({ error: 'Dataset is empty', code: 'DATA_UNAVAILABLE' }, 503),
    );

    const error = await fetchDashboardCharts('Age', fetchImpl).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DashboardRequestError);
    if (!(error instanceof DashboardRequestError)) return;
    expect(error.status).toBe(503);
    expect(error.message).toBe('Dataset is empty');
    expect(error.code).toBe('DATA_UNAVAILABLE');
  });
});

describe('fetchDashboardOverview', () => {
  it('falls back to the status when the error body is not JSON', async () => {
    const fetchImpl = vi.fn(async () => ({
      ok: false,
      status: 500,
      json: async () => {
        throw new SyntaxError('Unexpected token <');
      },
    }));

    await expect(fetchDashboardOverview(fetchImpl)).rejects.toThrow('Request failed with status 500');
    expect(fetchImpl).toHaveBeenCalledWith('/api/dashboard');
  });
});
