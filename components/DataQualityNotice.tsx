'use client';

import { AlertTriangle } from 'lucide-react';
import type { DataQualityReport } from '@/lib/types';

interface DataQualityNoticeProps {
  report: DataQualityReport;
}

export function DataQualityNotice({ report }: DataQualityNoticeProps) {
  if (report.warnings.length === 0) {
    return null;
  }

  return (
    <div className="card border border-noshow/40">
      <div className="flex items-center gap-2 mb-2 text-noshow">
        <AlertTriangle className="w-5 h-5" />
        <h2 className="font-semibold">Data quality</h2>
      </div>
      <ul className="list-disc list-inside text-sm text-gray-300 space-y-1">
        {report.warnings.map((warning) => (
          <li key={warning}>{warning}</li>
        ))}
      </ul>
    </div>
  );
}
