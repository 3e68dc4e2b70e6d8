import { z } from 'zod';
import type { AppointmentRecord } from './types/appointment';

/** Dropdown values are the dataset's own column names. */
export const FEATURE_KEYS = [
  'Age',
  'Gender',
  'Scholarship',
  'Hipertension',
  'Diabetes',
  'Alcoholism',
  'SMS_received',
  'WaitingDays',
] as const;

export type FeatureKey = (typeof FEATURE_KEYS)[number];

export type NumericFeatureKey = Extract<FeatureKey, 'Age' | 'WaitingDays'>;

export type CategoricalFeatureKey = Exclude<FeatureKey, NumericFeatureKey>;

export const DEFAULT_FEATURE: FeatureKey = 'Age';

export const FEATURE_LABELS: Record<FeatureKey, string> = {
  Age: 'Age',
  Gender: 'Gender',
  Scholarship: 'Scholarship',
  Hipertension: 'Hypertension',
  Diabetes: 'Diabetes',
  Alcoholism: 'Alcoholism',
  SMS_received: 'SMS Received',
  WaitingDays: 'Waiting Days',
};

export const FEATURE_OPTIONS: { value: FeatureKey; label: string }[] = FEATURE_KEYS.map(
  (value) => ({ value, label: FEATURE_LABELS[value] }),
);

export const featureKeySchema = z.enum(FEATURE_KEYS);

export function isFeatureKey(value: unknown): value is FeatureKey {
  return featureKeySchema.safeParse(value).success;
}

export function isNumericFeature(feature: FeatureKey): feature is NumericFeatureKey {
  return feature === 'Age' || feature === 'WaitingDays';
}

export const NUMERIC_FEATURE_VALUES: Record<NumericFeatureKey, (record: AppointmentRecord) => number> = {
  Age: (r) => r.age,
  WaitingDays: (r) => r.waitingDays,
};

// Binary flags are charted through their string mirrors so the axis stays categorical.
export const CATEGORICAL_FEATURE_VALUES: Record<
  CategoricalFeatureKey,
  (record: AppointmentRecord) => string
> = {
  Gender: (r) => r.gender,
  Scholarship: (r) => r.scholarshipLabel,
  Hipertension: (r) => r.hypertensionLabel,
  Diabetes: (r) => r.diabetesLabel,
  Alcoholism: (r) => r.alcoholismLabel,
  SMS_received: (r) => r.smsReceivedLabel,
};
