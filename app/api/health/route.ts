import { NextResponse } from 'next/server';
import { peekDashboardContext } from '@/lib/dashboard-store';

export const dynamic = 'force-dynamic';

export async function GET() {
  const context = peekDashboardContext();

  const body = {
    status: context ? 'ok' : 'loading',
    dataset: context !== null,
    appointments: context?.summary.totalAppointments ?? 0,
    loadedAt: context?.source.loadedAt ?? null,
    uptime: process.uptime(),
  };

  return NextResponse.json(body, { status: context ? 200 : 503 });
}
