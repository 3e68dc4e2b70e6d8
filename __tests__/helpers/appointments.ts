import { REQUIRED_COLUMNS, type RawAppointmentRow } from '@/lib/appointment-schema';
import { cleanAppointments, type LoadedDataset } from '@/lib/dataset-loader';
import type { AppointmentRecord } from '@/lib/types';

/** Scheduled Monday 10:00, attending Friday 2016-04-29: 3 waiting days. */
export function rawRow(overrides: Partial<RawAppointmentRow> = {}): RawAppointmentRow {
  return {
    PatientId: '29872499824296',
    AppointmentID: '5642903',
    Gender: 'F',
    ScheduledDay: '2016-04-25T10:00:00Z',
    AppointmentDay: '2016-04-29T00:00:00Z',
    Age: '30',
    Neighbourhood: 'JARDIM DA PENHA',
    Scholarship: '0',
    Hipertension: '0',
    Diabetes: '0',
    Alcoholism: '0',
    Handcap: '0',
    SMS_received: '0',
    'No-show': 'No',
    ...overrides,
  };
}

export function makeRecords(...overrides: Partial<RawAppointmentRow>[]): readonly AppointmentRecord[] {
  return cleanAppointments(overrides.map((o) => rawRow(o)));
}

export function toCsv(rows: RawAppointmentRow[], columns: readonly string[] = REQUIRED_COLUMNS): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    const cells: string[] = [];
    for (const column of columns) {
      const match = Object.entries(row).find(([key]) => key === column);
      cells.push(match ? match[1] : '');
    }
    lines.push(cells.join(','));
  }
  return lines.join('\n');
}

export function makeDataset(records: readonly AppointmentRecord[], rawRowCount = records.length): LoadedDataset {
  return {
    records,
    rawRowCount,
    sourceUrl: 'https://example.test/appointments.csv',
    loadedAt: '2024-01-01T00:00:00.000Z',
  };
}
