'use client';

import type { ReactNode } from 'react';
import type { ChartTheme } from '@/lib/types';

interface ChartFrameProps {
  title: string;
  theme: ChartTheme;
  children: ReactNode;
}

export function ChartFrame({ title, theme, children }: ChartFrameProps) {
  return (
    <div
      className="rounded-lg p-4 shadow-lg h-full"
      style={{ backgroundColor: theme.paperBackground, color: theme.fontColor }}
    >
      <h3
        className="font-semibold mb-4"
        style={{ color: theme.titleFontColor, fontSize: Math.round(theme.titleFontSize * 0.75) }}
      >
        {title}
      </h3>
      {children}
    </div>
  );
}

export function EmptyChart() {
  return (
    <div className="flex items-center justify-center h-64 text-gray-400">
      No data to display
    </div>
  );
}

export function axisLabel(title: string, theme: ChartTheme, vertical = false) {
  return {
    value: title,
    angle: vertical ? -90 : 0,
    position: vertical ? ('insideLeft' as const) : ('insideBottom' as const),
    offset: vertical ? 0 : -5,
    fill: theme.axisTitleFontColor,
    fontSize: Math.round(theme.axisTitleFontSize * 0.75),
  };
}

export function tooltipStyle(theme: ChartTheme) {
  return {
    contentStyle: {
      backgroundColor: theme.paperBackground,
      border: `1px solid ${theme.plotBackground}`,
      fontSize: 12,
    },
    labelStyle: { color: theme.fontColor },
  };
}
