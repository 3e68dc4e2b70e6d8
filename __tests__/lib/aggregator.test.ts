import { describe, it, expect } from 'vitest';
import {
  computeAgeGroupRates,
  computeDataQuality,
  computeSummaryCards,
  computeWeekdayRates,
  formatPercent,
} from '@/lib/aggregator';
import { makeRecords } from '../helpers/appointments';

const TUESDAY = '2016-05-03T00:00:00Z';

describe('computeSummaryCards', () => {
  it('reports 0.0% show rate when every appointment is a no-show', () => {
    const summary = computeSummaryCards(makeRecords({ 'No-show': 'Yes' }, { 'No-show': 'Yes' }));
    expect(summary.noShowRate).toBe(100);
    expect(summary.formatted.noShowRate).toBe('100.0%');
    expect(summary.formatted.showRate).toBe('0.0%');
  });

  it('formats totals and the average age', () => {
    const summary = computeSummaryCards(makeRecords({ Age: '20' }, { Age: '31' }, { Age: '25', 'No-show': 'Yes' }));
    expect(summary.totalAppointments).toBe(3);
    expect(summary.averageAge).toBeCloseTo(25.333, 3);
    expect(summary.formatted.averageAge).toBe('25.3');
    expect(summary.formatted.noShowRate).toBe('33.3%');
    expect(summary.formatted.showRate).toBe('66.7%');
  });

  it('uses placeholders for an empty table', () => {
    const summary = computeSummaryCards([]);
    expect(summary.averageAge).toBeNull();
    expect(summary.formatted).toEqual({
      totalAppointments: '0',
      averageAge: '–',
      showRate: '–',
      noShowRate: '–',
    });
  });
});

describe('computeWeekdayRates', () => {
  it('computes the rate per appointment weekday', () => {
    const records = makeRecords(
      { AppointmentDay: TUESDAY, 'No-show': 'Yes' },
      { AppointmentDay: TUESDAY },
      { AppointmentDay: TUESDAY },
      {},
    );
    const rates = computeWeekdayRates(records);

    expect(rates.map((r) => r.weekday)).toEqual([
      'Monday',
      'Tuesday',
      'Wednesday',
      'Thursday',
      'Friday',
      'Saturday',
      'Sunday',
    ]);
    const tuesday = rates[1];
    expect(tuesday.count).toBe(3);
    expect(tuesday.rate).toBeCloseTo(33.333, 3);
    expect(rates[4]).toEqual({ weekday: 'Friday', count: 1, rate: 0 });
  });

  it('leaves every other weekday null for a single Tuesday no-show', () => {
    const rates = computeWeekdayRates(makeRecords({ AppointmentDay: TUESDAY, 'No-show': 'Yes' }));
    expect(rates.map((r) => r.rate)).toEqual([null, 100, null, null, null, null, null]);
  });

  it('keeps empty weekdays with a null rate', () => {
    const rates = computeWeekdayRates(makeRecords({}));
    expect(rates[0]).toEqual({ weekday: 'Monday', count: 0, rate: null });
  });

  it('counts every appointment exactly once', () => {
    const records = makeRecords({ AppointmentDay: TUESDAY }, {}, {}, { AppointmentDay: '2016-05-07' });
    const total = computeWeekdayRates(records).reduce((sum, r) => sum + r.count, 0);
    expect(total).toBe(records.length);
  });
});

describe('computeAgeGroupRates', () => {
  it('emits all ten decade buckets even when empty', () => {
    const rows = computeAgeGroupRates(makeRecords({ Age: '5', 'No-show': 'Yes' }, { Age: '15' }, { Age: '19', 'No-show': 'Yes' }));

    expect(rows).toHaveLength(10);
    expect(rows[0]).toEqual({ label: '[0, 10)', lower: 0, upper: 10, count: 1, rate: 100 });
    expect(rows[1]).toEqual({ label: '[10, 20)', lower: 10, upper: 20, count: 2, rate: 50 });
    expect(rows[2].rate).toBeNull();
    expect(rows[9].label).toBe('[90, 100)');
  });

  it('places the bucket edge in the upper bucket', () => {
    const rows = computeAgeGroupRates(makeRecords({ Age: '10' }));
    expect(rows[0].count).toBe(0);
    expect(rows[1].count).toBe(1);
  });

  it('adds an overflow row for ages of 100 and above', () => {
    const rows = computeAgeGroupRates(makeRecords({ Age: '100' }, { Age: '115', 'No-show': 'Yes' }));
    expect(rows).toHaveLength(11);
    expect(rows[10]).toEqual({ label: '100+', lower: 100, upper: null, count: 2, rate: 50 });
  });
});

describe('formatPercent', () => {
  it('formats to one decimal', () => {
    expect(formatPercent((2 / 3) * 100)).toBe('66.7%');
    expect(formatPercent(0)).toBe('0.0%');
    expect(formatPercent(null)).toBe('–');
  });
});

describe('computeDataQuality', () => {
  it('reports nothing for a clean table', () => {
    expect(computeDataQuality(makeRecords({}), 0)).toEqual({
      droppedNegativeAge: 0,
      negativeWaitingDays: 0,
      ageOverflow: 0,
      warnings: [],
    });
  });

  it('counts dropped rows, negative waiting days and overflow ages', () => {
    const records = makeRecords(
      { ScheduledDay: '2016-04-29T18:38:08Z', AppointmentDay: '2016-04-29T00:00:00Z' },
      { Age: '102' },
    );
    const report = computeDataQuality(records, 2);

    expect(report.negativeWaitingDays).toBe(1);
    expect(report.ageOverflow).toBe(1);
    expect(report.warnings).toEqual([
      '2 row(s) with a negative age were dropped.',
      '1 appointment(s) have negative waiting days (appointment day before the scheduling time).',
      '1 appointment(s) for patients aged 100 or older fall outside the age buckets.',
    ]);
  });
});
