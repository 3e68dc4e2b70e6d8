import { describe, it, expect, vi } from 'vitest';
import {
  cleanAppointments,
  fetchDatasetCsv,
  loadAppointments,
  parseDatasetCsv,
  type FetchLike,
} from '@/lib/dataset-loader';
import { DataUnavailableError, MalformedSchemaError } from '@/lib/dataset-errors';
import { REQUIRED_COLUMNS } from '@/lib/appointment-schema';
import { rawRow, toCsv } from '../helpers/appointments';

function fakeFetch(body: string, status = 200): FetchLike {
  return vi.fn(async () => ({ ok: status >= 200 && status < 300, status, text: async () => body }));
}

describe('parseDatasetCsv', () => {
  it('returns one raw row per data line', () => {
    const csv = toCsv([rawRow({ AppointmentID: '1' }), rawRow({ AppointmentID: '2', Gender: 'M' })]);
    const rows = parseDatasetCsv(csv);
    expect(rows).toHaveLength(2);
    expect(rows[1].AppointmentID).toBe('2');
    expect(rows[1].Gender).toBe('M');
    expect(rows[0]['No-show']).toBe('No');
  });

  it('trims header names', () => {
    const csv = toCsv([rawRow()], REQUIRED_COLUMNS).replace('Age,', ' Age ,');
    expect(parseDatasetCsv(csv)[0].Age).toBe('30');
  });

  it('names every missing column', () => {
    const columns = REQUIRED_COLUMNS.filter((c) => c !== 'SMS_received' && c !== 'No-show');
    const csv = toCsv([rawRow()], columns);

    expect(() => parseDatasetCsv(csv)).toThrow(MalformedSchemaError);
    try {
      parseDatasetCsv(csv);
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedSchemaError);
      if (error instanceof MalformedSchemaError) {
        expect(error.missingColumns).toEqual(['SMS_received', 'No-show']);
        expect(error.message).toBe('Dataset is missing required columns: SMS_received, No-show');
        expect(error.code).toBe('MALFORMED_SCHEMA');
      }
    }
  });

  it('rejects an empty body', () => {
    expect(() => parseDatasetCsv('  \n')).toThrow(new DataUnavailableError('Dataset is empty'));
  });

  it('rejects rows with missing fields', () => {
    const csv = `${REQUIRED_COLUMNS.join(',')}\n1,2,F`;
    expect(() => parseDatasetCsv(csv)).toThrow(/^Dataset could not be parsed/);
  });
});

describe('cleanAppointments', () => {
  it('derives waiting days, weekday, flag and labels', () => {
    const [record] = cleanAppointments([
      rawRow({ 'No-show': 'Yes', SMS_received: '1', Hipertension: '1' }),
    ]);

    expect(record.scheduledDay).toBe('2016-04-25T10:00:00');
    expect(record.appointmentDay).toBe('2016-04-29T00:00:00');
    expect(record.waitingDays).toBe(3);
    expect(record.appointmentWeekday).toBe('Friday');
    expect(record.noShowFlag).toBe(1);
    expect(record.smsReceived).toBe(1);
    expect(record.smsReceivedLabel).toBe('1');
    expect(record.hypertensionLabel).toBe('1');
    expect(record.scholarshipLabel).toBe('0');
  });

  it('drops negative ages before checking the other cells', () => {
    const records = cleanAppointments([rawRow({ Age: '-1', Scholarship: 'x' }), rawRow({ Age: '0' })]);
    expect(records).toHaveLength(1);
    expect(records[0].age).toBe(0);
  });

  it('fails on a non-integer age', () => {
    expect(() => cleanAppointments([rawRow({ Age: 'abc' })])).toThrow('Dataset row 1: Age: expected an integer');
  });

  it('fails on an invalid flag with the row number', () => {
    expect(() => cleanAppointments([rawRow(), rawRow({ Scholarship: '2' })])).toThrow(
      /^Dataset row 2: Scholarship: /,
    );
  });

  it('fails on an invalid timestamp', () => {
    expect(() => cleanAppointments([rawRow({ AppointmentDay: '2016-02-30' })])).toThrow(
      'Dataset row 1: AppointmentDay: invalid timestamp "2016-02-30"',
    );
  });

  it('returns frozen records', () => {
    const records = cleanAppointments([rawRow()]);
    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
  });
});

describe('fetchDatasetCsv', () => {
  it('returns the body text', async () => {
    await expect(fetchDatasetCsv('https://example.test/a.csv', fakeFetch('a,b'))).resolves.toBe('a,b');
  });

  it('fails on a non-2xx status', async () => {
    await expect(fetchDatasetCsv('https://example.test/a.csv', fakeFetch('', 404))).rejects.toThrow(
      'Could not fetch dataset from https://example.test/a.csv: HTTP 404',
    );
  });

  it('wraps network failures', async () => {
    const failing: FetchLike = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(fetchDatasetCsv('https://example.test/a.csv', failing)).rejects.toBeInstanceOf(
      DataUnavailableError,
    );
  });
});

describe('loadAppointments', () => {
  it('fetches, parses and cleans', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const csv = toCsv([rawRow(), rawRow({ Age: '-1' }), rawRow({ 'No-show': 'Yes' })]);
    const fetchImpl = fakeFetch(csv);

    const dataset = await loadAppointments('https://example.test/a.csv', fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith('https://example.test/a.csv');
    expect(dataset.rawRowCount).toBe(3);
    expect(dataset.records).toHaveLength(2);
    expect(dataset.sourceUrl).toBe('https://example.test/a.csv');
  });
});
