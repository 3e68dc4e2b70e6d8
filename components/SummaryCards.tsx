'use client';

import { Activity, CalendarCheck, CalendarX, Users } from 'lucide-react';
import type { ReactNode } from 'react';
import type { SummaryCards as SummaryCardsData } from '@/lib/types';

interface SummaryCardsProps {
  summary: SummaryCardsData;
}

interface CardProps {
  label: string;
  value: string;
  icon: ReactNode;
  accent: string;
}

function Card({ label, value, icon, accent }: CardProps) {
  return (
    <div className="card flex items-center gap-4">
      <div className={accent}>{icon}</div>
      <div>
        <p className="text-sm text-gray-400">{label}</p>
        <p className="text-2xl font-semibold text-white">{value}</p>
      </div>
    </div>
  );
}

export function SummaryCards({ summary }: SummaryCardsProps) {
  const { formatted } = summary;
  return (
    <div className="grid grid-cols-1 sm:grid-cols-2 lg:grid-cols-4 gap-4">
      <Card label="Total Appointments" value={formatted.totalAppointments} icon={<Users className="w-8 h-8" />} accent="text-white" />
      <Card label="Average Age" value={formatted.averageAge} icon={<Activity className="w-8 h-8" />} accent="text-white" />
      <Card label="Show Rate" value={formatted.showRate} icon={<CalendarCheck className="w-8 h-8" />} accent="text-show" />
      <Card label="No-Show Rate" value={formatted.noShowRate} icon={<CalendarX className="w-8 h-8" />} accent="text-noshow" />
    </div>
  );
}
