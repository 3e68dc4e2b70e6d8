import { describe, it, expect } from 'vitest';
import { WEEKDAYS, parseNaiveTimestamp, weekdayOf, wholeDaysBetween } from '@/lib/naive-datetime';

describe('parseNaiveTimestamp', () => {
  it('drops a trailing Z and keeps the wall-clock time', () => {
    expect(parseNaiveTimestamp('2016-04-29T18:38:08Z')).toBe('2016-04-29T18:38:08');
  });

  it('drops a numeric offset without shifting the time', () => {
    expect(parseNaiveTimestamp('2016-04-29 18:38:08+02:00')).toBe('2016-04-29T18:38:08');
  });

  it('fills in midnight for a bare date', () => {
    expect(parseNaiveTimestamp('2016-04-29')).toBe('2016-04-29T00:00:00');
  });

  it('rejects impossible dates instead of rolling them over', () => {
    expect(parseNaiveTimestamp('2016-02-30T00:00:00Z')).toBeNull();
    expect(parseNaiveTimestamp('2016-13-01')).toBeNull();
  });

  it('rejects non-timestamps', () => {
    expect(parseNaiveTimestamp('not-a-date')).toBeNull();
    expect(parseNaiveTimestamp('')).toBeNull();
  });
});

describe('wholeDaysBetween', () => {
  it('floors partial days', () => {
    expect(wholeDaysBetween('2016-04-25T10:00:00', '2016-04-29T00:00:00')).toBe(3);
  });

  it('gives -1 for a same-day appointment scheduled later that day', () => {
    expect(wholeDaysBetween('2016-04-29T18:38:08', '2016-04-29T00:00:00')).toBe(-1);
  });

  it('gives 0 for identical timestamps', () => {
    expect(wholeDaysBetween('2016-04-29T00:00:00', '2016-04-29T00:00:00')).toBe(0);
  });
});

describe('weekdayOf', () => {
  it('names the weekday of the calendar date', () => {
    expect(weekdayOf('2016-04-29T00:00:00')).toBe('Friday');
    expect(weekdayOf('2016-05-01T23:59:59')).toBe('Sunday');
    expect(weekdayOf('2016-05-02T00:00:00')).toBe('Monday');
  });

  it('orders weekdays Monday first', () => {
    expect(WEEKDAYS).toEqual(['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']);
  });
});
