'use client';

import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import { rateBarRows } from '@/lib/chart-data';
import type { RateBarSpec } from '@/lib/types';
import { ChartFrame, EmptyChart, axisLabel, tooltipStyle } from './ChartFrame';

interface RateBarChartProps {
  spec: RateBarSpec;
}

export function RateBarChart({ spec }: RateBarChartProps) {
  const data = rateBarRows(spec);
  const { theme } = spec;

  return (
    <ChartFrame title={spec.title} theme={theme}>
      {data.length === 0 ? (
        <EmptyChart />
      ) : (
        <ResponsiveContainer width="100%" height={400}>
          <BarChart data={data} margin={{ top: 20, right: 30, left: 20, bottom: 30 }}>
            {theme.showGrid && <CartesianGrid strokeDasharray="3 3" stroke={theme.plotBackground} />}
            <XAxis dataKey="label" tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.x.title, theme)} />
            <YAxis tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.y.title, theme, true)} />
            <Tooltip
              {...tooltipStyle(theme)}
              formatter={(value) => [
                typeof value === 'number' ? `${value.toFixed(1)}%` : 'no appointments',
                spec.y.title,
              ]}
            />
            <Bar dataKey="rate" fill={spec.color} name={spec.y.title} />
          </BarChart>
        </ResponsiveContainer>
      )}
    </ChartFrame>
  );
}
