/**
 * Summary tables over the cleaned appointment table.
 * Computed once when the dashboard context is built.
 */

import { WEEKDAYS } from './naive-datetime';
import type { AppointmentRecord, Weekday } from './types/appointment';
import type { AgeGroupRate, DataQualityReport, SummaryCards, WeekdayRate } from './types/dashboard';

export const AGE_BUCKET_WIDTH = 10;
export const AGE_BUCKET_LIMIT = 100;
export const AGE_OVERFLOW_LABEL = `${AGE_BUCKET_LIMIT}+`;

const EMPTY_VALUE = '–';

type Tally = { count: number; noShows: number };

function toRate(tally: Tally): number | null {
  return tally.count === 0 ? null : (tally.noShows / tally.count) * 100;
}

export function formatPercent(value: number | null): string {
  return value === null ? EMPTY_VALUE : `${value.toFixed(1)}%`;
}

/**
 * Right-open decade buckets [0, 10) ... [90, 100). Ages of 100 and above are
 * collected in an overflow row, emitted only when it is non-empty.
 */
export function computeAgeGroupRates(records: readonly AppointmentRecord[]): AgeGroupRate[] {
  const bucketCount = AGE_BUCKET_LIMIT / AGE_BUCKET_WIDTH;
  const tallies: Tally[] = Array.from({ length: bucketCount }, () => ({ count: 0, noShows: 0 }));
  const overflow: Tally = { count: 0, noShows: 0 };

  for (const record of records) {
    const tally =
      record.age >= AGE_BUCKET_LIMIT ? overflow : tallies[Math.floor(record.age / AGE_BUCKET_WIDTH)];
    tally.count += 1;
    tally.noShows += record.noShowFlag;
  }

  const rows: AgeGroupRate[] = tallies.map((tally, i) => {
    const lower = i * AGE_BUCKET_WIDTH;
    const upper = lower + AGE_BUCKET_WIDTH;
    return { label: `[${lower}, ${upper})`, lower, upper, count: tally.count, rate: toRate(tally) };
  });

  if (overflow.count > 0) {
    rows.push({
      label: AGE_OVERFLOW_LABEL,
      lower: AGE_BUCKET_LIMIT,
      upper: null,
      count: overflow.count,
      rate: toRate(overflow),
    });
  }

  return rows;
}

export function computeWeekdayRates(records: readonly AppointmentRecord[]): WeekdayRate[] {
  const tallies = new Map<Weekday, Tally>(WEEKDAYS.map((day) => [day, { count: 0, noShows: 0 }]));

  for (const record of records) {
    const tally = tallies.get(record.appointmentWeekday);
    if (!tally) continue;
    tally.count += 1;
    tally.noShows += record.noShowFlag;
  }

  return WEEKDAYS.map((weekday) => {
    const tally = tallies.get(weekday) ?? { count: 0, noShows: 0 };
    return { weekday, count: tally.count, rate: toRate(tally) };
  });
}

export function computeSummaryCards(records: readonly AppointmentRecord[]): SummaryCards {
  const total = records.length;
  let ageSum = 0;
  let noShows = 0;
  for (const record of records) {
    ageSum += record.age;
    noShows += record.noShowFlag;
  }

  const averageAge = total === 0 ? null : ageSum / total;
  const noShowRate = total === 0 ? null : (noShows / total) * 100;
  const showRate = noShowRate === null ? null : 100 - noShowRate;

  return {
    totalAppointments: total,
    averageAge,
    showRate,
    noShowRate,
    formatted: {
      totalAppointments: total.toLocaleString('en-US'),
      averageAge: averageAge === null ? EMPTY_VALUE : averageAge.toFixed(1),
      showRate: formatPercent(showRate),
      noShowRate: formatPercent(noShowRate),
    },
  };
}

export function computeDataQuality(
  records: readonly AppointmentRecord[],
  droppedNegativeAge: number,
): DataQualityReport {
  let negativeWaitingDays = 0;
  let ageOverflow = 0;
  for (const record of records) {
    if (record.waitingDays < 0) negativeWaitingDays += 1;
    if (record.age >= AGE_BUCKET_LIMIT) ageOverflow += 1;
  }

  const warnings: string[] = [];
  if (droppedNegativeAge > 0) {
    warnings.push(`${droppedNegativeAge} row(s) with a negative age were dropped.`);
  }
  if (negativeWaitingDays > 0) {
    warnings.push(
      `${negativeWaitingDays} appointment(s) have negative waiting days (appointment day before the scheduling time).`,
    );
  }
  if (ageOverflow > 0) {
    warnings.push(`${ageOverflow} appointment(s) for patients aged ${AGE_BUCKET_LIMIT} or older fall outside the age buckets.`);
  }

  return { droppedNegativeAge, negativeWaitingDays, ageOverflow, warnings };
}
