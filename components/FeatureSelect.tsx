'use client';

import { isFeatureKey, type FeatureKey } from '@/lib/features';
import type { FeatureOption } from '@/lib/types';

interface FeatureSelectProps {
  options: FeatureOption[];
  value: FeatureKey;
  onChange: (feature: FeatureKey) => void;
  disabled?: boolean;
}

export function FeatureSelect({ options, value, onChange, disabled = false }: FeatureSelectProps) {
  return (
    <div className="card">
      <label htmlFor="feature-dropdown" className="block text-sm font-medium text-gray-300 mb-2">
        Select Feature:
      </label>
      <select
        id="feature-dropdown"
        value={value}
        disabled={disabled}
        onChange={(e) => {
          const next = e.target.value;
          if (isFeatureKey(next)) onChange(next);
        }}
        className="w-full rounded-md bg-plot text-white border border-gray-600 px-3 py-2 disabled:opacity-60"
      >
        {options.map((option) => (
          <option key={option.value} value={option.value}>
            {option.label}
          </option>
        ))}
      </select>
    </div>
  );
}
