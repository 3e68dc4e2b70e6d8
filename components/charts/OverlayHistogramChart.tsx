'use client';

import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { histogramRows } from '@/lib/chart-data';
import type { OverlayHistogramSpec } from '@/lib/types';
import { ChartFrame, EmptyChart, axisLabel, tooltipStyle } from './ChartFrame';

interface OverlayHistogramChartProps {
  spec: OverlayHistogramSpec;
}

export function OverlayHistogramChart({ spec }: OverlayHistogramChartProps) {
  const data = histogramRows(spec);
  const { theme } = spec;

  return (
    <ChartFrame title={spec.title} theme={theme}>
      {data.length === 0 ? (
        <EmptyChart />
      ) : (
        <ResponsiveContainer width="100%" height={400}>
          {/* Overlay: zero gap between series so bars of one bin share the slot */}
          <BarChart data={data} barGap="-100%" barCategoryGap={0} margin={{ top: 20, right: 30, left: 20, bottom: 30 }}>
            {theme.showGrid && <CartesianGrid strokeDasharray="3 3" stroke={theme.plotBackground} />}
            <XAxis dataKey="label" tick={{ fill: theme.fontColor, fontSize: 11 }} label={axisLabel(spec.x.title, theme)} />
            <YAxis tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.y.title, theme, true)} />
            <Tooltip {...tooltipStyle(theme)} labelFormatter={(label) => `${spec.x.title}: ${label}`} />
            <Legend wrapperStyle={{ color: theme.fontColor, fontSize: 12 }} verticalAlign="top" />
            {spec.series.map((s) => (
              <Bar key={s.key} dataKey={s.key} name={`${spec.legendTitle}=${s.label}`} fill={s.color} fillOpacity={0.6} />
            ))}
          </BarChart>
        </ResponsiveContainer>
      )}
    </ChartFrame>
  );
}
