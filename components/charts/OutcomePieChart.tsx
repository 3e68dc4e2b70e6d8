'use client';

import { PieChart, Pie, Cell, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import type { PieSpec } from '@/lib/types';
import { ChartFrame, EmptyChart, tooltipStyle } from './ChartFrame';

interface OutcomePieChartProps {
  spec: PieSpec;
}

export function OutcomePieChart({ spec }: OutcomePieChartProps) {
  const { theme } = spec;
  const total = spec.slices.reduce((sum, s) => sum + s.value, 0);

  return (
    <ChartFrame title={spec.title} theme={theme}>
      {total === 0 ? (
        <EmptyChart />
      ) : (
        <ResponsiveContainer width="100%" height={400}>
          <PieChart>
            <Pie
              data={spec.slices}
              dataKey="value"
              nameKey="label"
              outerRadius="75%"
              label={({ percent }: { percent?: number }) => `${((percent ?? 0) * 100).toFixed(1)}%`}
            >
              {spec.slices.map((slice) => (
                <Cell key={slice.key} fill={slice.color} />
              ))}
            </Pie>
            <Tooltip {...tooltipStyle(theme)} />
            <Legend wrapperStyle={{ color: theme.fontColor, fontSize: 12 }} />
          </PieChart>
        </ResponsiveContainer>
      )}
    </ChartFrame>
  );
}
