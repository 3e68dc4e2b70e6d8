'use client';

import type { ChartSpec } from '@/lib/types';
import { GroupedBarChart } from './GroupedBarChart';
import { OutcomePieChart } from './OutcomePieChart';
import { OverlayHistogramChart } from './OverlayHistogramChart';
import { RateBarChart } from './RateBarChart';
import { WaitingDaysBoxPlot } from './WaitingDaysBoxPlot';

interface ChartSlotProps {
  id: string;
  spec: ChartSpec | undefined;
}

export function ChartSlot({ id, spec }: ChartSlotProps) {
  if (!spec) {
    return <div id={id} className="rounded-lg bg-paper h-[460px] animate-pulse" />;
  }

  return (
    <div id={id}>
      {(() => {
        switch (spec.kind) {
          case 'overlay-histogram':
            return <OverlayHistogramChart spec={spec} />;
          case 'grouped-bar':
            return <GroupedBarChart spec={spec} />;
          case 'pie':
            return <OutcomePieChart spec={spec} />;
          case 'box':
            return <WaitingDaysBoxPlot spec={spec} />;
          case 'rate-bar':
            return <RateBarChart spec={spec} />;
        }
      })()}
    </div>
  );
}
