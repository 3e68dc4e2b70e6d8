'use client';

import { ComposedChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, Legend, ResponsiveContainer } from 'recharts';
import { barGeometry, boxKeys, boxRows } from '@/lib/chart-data';
import type { BoxPlotSpec } from '@/lib/types';
import { ChartFrame, EmptyChart, axisLabel, tooltipStyle } from './ChartFrame';

const BOX_WIDTH = 28;

interface WaitingDaysBoxPlotProps {
  spec: BoxPlotSpec;
}

function whiskerShape(color: string) {
  return function WhiskerShape(props: unknown) {
    const geometry = barGeometry(props);
    if (!geometry) return <g />;
    const { x, y, width, height } = geometry;
    const center = x + width / 2;
    const cap = width / 4;
    return (
      <g stroke={color} strokeWidth={1.5}>
        <line x1={center} x2={center} y1={y} y2={y + height} />
        <line x1={center - cap} x2={center + cap} y1={y} y2={y} />
        <line x1={center - cap} x2={center + cap} y1={y + height} y2={y + height} />
      </g>
    );
  };
}

function medianShape(color: string) {
  return function MedianShape(props: unknown) {
    const geometry = barGeometry(props);
    if (!geometry) return <g />;
    const { x, y, width } = geometry;
    return <line x1={x} x2={x + width} y1={y} y2={y} stroke={color} strokeWidth={2} />;
  };
}

/**
 * Box plot from ranged bars. Whiskers, boxes and medians each sit on their
 * own x-axis over the same categories with one bar size, so every series
 * gets the same offset inside a category on all three.
 */
export function WaitingDaysBoxPlot({ spec }: WaitingDaysBoxPlotProps) {
  const data = boxRows(spec);
  const { theme } = spec;

  return (
    <ChartFrame title={spec.title} theme={theme}>
      {data.length === 0 ? (
        <EmptyChart />
      ) : (
        <ResponsiveContainer width="100%" height={420}>
          <ComposedChart data={data} margin={{ top: 20, right: 30, left: 20, bottom: 30 }}>
            {theme.showGrid && <CartesianGrid strokeDasharray="3 3" stroke={theme.plotBackground} />}
            <XAxis
              xAxisId="whiskers"
              dataKey="category"
              tick={{ fill: theme.fontColor, fontSize: 12 }}
              label={axisLabel(spec.x.title, theme)}
            />
            <XAxis xAxisId="boxes" dataKey="category" hide />
            <XAxis xAxisId="medians" dataKey="category" hide />
            <YAxis tick={{ fill: theme.fontColor, fontSize: 12 }} label={axisLabel(spec.y.title, theme, true)} />
            <Tooltip {...tooltipStyle(theme)} />
            <Legend wrapperStyle={{ color: theme.fontColor, fontSize: 12 }} verticalAlign="top" />
            {spec.series.map((s) => (
              <Bar
                key={`${s.key}-whisker`}
                xAxisId="whiskers"
                dataKey={boxKeys(s.key).whisker}
                name={`${spec.legendTitle}=${s.label} whiskers`}
                fill={s.color}
                barSize={BOX_WIDTH}
                shape={whiskerShape(s.color)}
                legendType="none"
              />
            ))}
            {spec.series.map((s) => (
              <Bar
                key={`${s.key}-box`}
                xAxisId="boxes"
                dataKey={boxKeys(s.key).box}
                name={`${spec.legendTitle}=${s.label}`}
                fill={s.color}
                fillOpacity={0.5}
                stroke={s.color}
                barSize={BOX_WIDTH}
              />
            ))}
            {spec.series.map((s) => (
              <Bar
                key={`${s.key}-median`}
                xAxisId="medians"
                dataKey={boxKeys(s.key).median}
                name={`${spec.legendTitle}=${s.label} median`}
                fill={theme.fontColor}
                barSize={BOX_WIDTH}
                shape={medianShape(theme.fontColor)}
                legendType="none"
              />
            ))}
          </ComposedChart>
        </ResponsiveContainer>
      )}
    </ChartFrame>
  );
}
