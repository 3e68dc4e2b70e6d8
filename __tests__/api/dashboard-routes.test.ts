// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NextRequest } from 'next/server';

vi.mock('@/lib/dashboard-store', () => ({
  getDashboardContext: vi.fn(),
  peekDashboardContext: vi.fn(),
}));

import { GET as getOverview } from '@/app/api/dashboard/route';
import { GET as getCharts } from '@/app/api/dashboard/charts/route';
import { GET as getHealth } from '@/app/api/health/route';
import { getDashboardContext, peekDashboardContext } from '@/lib/dashboard-store';
import { createDashboardContext } from '@/lib/dashboard-context';
import { DataUnavailableError } from '@/lib/dataset-errors';
import { makeDataset, makeRecords } from '../helpers/appointments';

const context = createDashboardContext(
  makeDataset(makeRecords({ Gender: 'M' }, { Gender: 'F', 'No-show': 'Yes' }, { Age: '62' })),
);

function makeRequest(path: string) {
  return new NextRequest(`http://localhost${path}`);
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.mocked(getDashboardContext).mockResolvedValue(context);
});

describe('GET /api/dashboard', () => {
  it('returns the summary cards and dropdown options', async () => {
    const res = await getOverview(makeRequest('/api/dashboard'));
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.summary.formatted).toEqual({
      totalAppointments: '3',
      averageAge: '40.7',
      showRate: '66.7%',
      noShowRate: '33.3%',
    });
    expect(body.defaultFeature).toBe('Age');
    expect(body.features).toHaveLength(8);
    expect(body.weekdayRates).toHaveLength(7);
  });

  it('answers 503 when the dataset could not be loaded', async () => {
    vi.mocked(getDashboardContext).mockRejectedValue(new DataUnavailableError('Dataset is empty'));

    const res = await getOverview(makeRequest('/api/dashboard'));
    expect(res.status).toBe(503);
    const body = await res.json();
    expect(body.code).toBe('DATA_UNAVAILABLE');
  });
});

describe('GET /api/dashboard/charts', () => {
  it('defaults to the Age histogram', async () => {
    const res = await getCharts(makeRequest('/api/dashboard/charts'));
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.feature).toBe('Age');
    expect(body.charts['main-graph'].kind).toBe('overlay-histogram');
    expect(Object.keys(body.charts)).toHaveLength(7);
  });

  it('builds grouped bars for a categorical feature', async () => {
    const res = await getCharts(makeRequest('/api/dashboard/charts?feature=Gender'));
    const body = await res.json();
    expect(body.feature).toBe('Gender');
    expect(body.charts['main-graph'].kind).toBe('grouped-bar');
    expect(body.charts['main-graph'].title).toBe('Attendance by Gender');
  });

  it('rejects an unknown feature', async () => {
    const res = await getCharts(makeRequest('/api/dashboard/charts?feature=Height'));
    expect(res.status).toBe(400);
    const body = await res.json();
    expect(body.error).toBe('Unknown feature "Height"');
    expect(body.code).toBe('INVALID_FEATURE');
    expect(getDashboardContext).not.toHaveBeenCalled();
  });
});

describe('GET /api/health', () => {
  it('reports loading until the context is ready', async () => {
    vi.mocked(peekDashboardContext).mockReturnValue(null);

    const res = await getHealth();
    expect(res.status).toBe(503);
    const body = await res.json();
    expect(body.status).toBe('loading');
    expect(body.dataset).toBe(false);
  });

  it('reports ok with the appointment count', async () => {
    vi.mocked(peekDashboardContext).mockReturnValue(context);

    const res = await getHealth();
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe('ok');
    expect(body.appointments).toBe(3);
    expect(body.loadedAt).toBe('2024-01-01T00:00:00.000Z');
  });
});
