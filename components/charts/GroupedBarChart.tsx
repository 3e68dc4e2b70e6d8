'use client';

import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { groupedBarRows } from '@/lib/chart-data';
import type { GroupedBarSpec } from '@/lib/types';
import { ChartFrame, EmptyChart, axisLabel, tooltipStyle } from './ChartFrame';

interface GroupedBarChartProps {
  spec: GroupedBarSpec;
}

export function GroupedBarChart({ spec }: GroupedBarChartProps) {
  const data = groupedBarRows(spec);
  const { theme } = spec;

  return (
    <ChartFrame title={spec.title} theme={theme}>
      {data.length === 0 ? (
        <EmptyChart />
      ) : (
        <ResponsiveContainer width="100%" height={400}>
          <BarChart data={data} margin={{ top: 20, right: 30, left: 20, bottom: 30 }}>
            {theme.showGrid && <CartesianGrid strokeDasharray="3 3" stroke={theme.plotBackground} />}
            <XAxis dataKey="category" tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.x.title, theme)} />
            <YAxis tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.y.title, theme, true)} />
            <Tooltip
              {...tooltipStyle(theme)}
              formatter={(value, name) => [`${value} appointments`, name]}
            />
            <Legend wrapperStyle={{ color: theme.fontColor, fontSize: 12 }} verticalAlign="top" />
            {spec.series.map((s) => (
              <Bar key={s.key} dataKey={s.key} name={`${spec.legendTitle}=${s.label}`} fill={s.color} radius={[4, 4, 0, 0]} />
            ))}
          </BarChart>
        </ResponsiveContainer>
      )}
    </ChartFrame>
  );
}
