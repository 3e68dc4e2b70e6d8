/**
 * Appointment dataset loader: fetch -> parse -> clean.
 * Runs once at startup; any failure is fatal and is not retried.
 */

import Papa from 'papaparse';
import { logger } from './logger';
import {
  REQUIRED_COLUMNS,
  appointmentRowSchema,
  integerCell,
  rawAppointmentRowSchema,
  type AppointmentRow,
  type RawAppointmentRow,
} from './appointment-schema';
import { DataUnavailableError, MalformedSchemaError } from './dataset-errors';
import { weekdayOf, wholeDaysBetween } from './naive-datetime';
import type { AppointmentRecord, BinaryFlag, FlagLabel } from './types/appointment';

export type FetchLike = (input: string) => Promise<Pick<Response, 'ok' | 'status' | 'text'>>;

export type LoadedDataset = {
  records: readonly AppointmentRecord[];
  rawRowCount: number;
  sourceUrl: string;
  loadedAt: string;
};

export async function fetchDatasetCsv(url: string, fetchImpl: FetchLike = fetch): Promise<string> {
  let res: Awaited<ReturnType<FetchLike>>;
  try {
    res = await fetchImpl(url);
  } catch (error) {
    throw new DataUnavailableError(`Could not fetch dataset from ${url}`, { cause: error });
  }

  if (!res.ok) {
    throw new DataUnavailableError(`Could not fetch dataset from ${url}: HTTP ${res.status}`);
  }

  try {
    return await res.text();
  } catch (error) {
    throw new DataUnavailableError(`Could not read dataset body from ${url}`, { cause: error });
  }
}

export function parseDatasetCsv(text: string): RawAppointmentRow[] {
  if (!text.trim()) {
    throw new DataUnavailableError('Dataset is empty');
  }

  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new MalformedSchemaError(missing);
  }

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    const where = first.row !== undefined ? ` (data row ${first.row + 1})` : '';
    throw new DataUnavailableError(
      `Dataset could not be parsed: ${first.message}${where}; ${parsed.errors.length} error(s) in total`,
    );
  }

  return parsed.data.map((row, index) => {
    const result = rawAppointmentRowSchema.safeParse(row);
    if (!result.success) {
      throw new DataUnavailableError(`Dataset row ${index + 1} is incomplete`, { cause: result.error });
    }
    return result.data;
  });
}

function flagLabel(flag: BinaryFlag): FlagLabel {
  return flag === 1 ? '1' : '0';
}

function toAppointmentRecord(row: AppointmentRow): AppointmentRecord {
  const record: AppointmentRecord = {
    patientId: row.PatientId,
    appointmentId: row.AppointmentID,
    gender: row.Gender,
    scheduledDay: row.ScheduledDay,
    appointmentDay: row.AppointmentDay,
    age: row.Age,
    neighbourhood: row.Neighbourhood,
    scholarship: row.Scholarship,
    hypertension: row.Hipertension,
    diabetes: row.Diabetes,
    alcoholism: row.Alcoholism,
    handicap: row.Handcap,
    smsReceived: row.SMS_received,
    noShow: row['No-show'],

    waitingDays: wholeDaysBetween(row.ScheduledDay, row.AppointmentDay),
    appointmentWeekday: weekdayOf(row.AppointmentDay),
    noShowFlag: row['No-show'] === 'Yes' ? 1 : 0,
    scholarshipLabel: flagLabel(row.Scholarship),
    hypertensionLabel: flagLabel(row.Hipertension),
    diabetesLabel: flagLabel(row.Diabetes),
    alcoholismLabel: flagLabel(row.Alcoholism),
    smsReceivedLabel: flagLabel(row.SMS_received),
  };
  return Object.freeze(record);
}

function describeIssues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Drops negative ages, then types and derives every remaining row.
 * Negative ages are dropped before the other cells are checked.
 */
export function cleanAppointments(rows: readonly RawAppointmentRow[]): readonly AppointmentRecord[] {
  const records: AppointmentRecord[] = [];

  rows.forEach((row, index) => {
    const age = integerCell.safeParse(row.Age);
    if (!age.success) {
      throw new DataUnavailableError(`Dataset row ${index + 1}: Age: ${age.error.issues[0]?.message ?? 'invalid'}`);
    }
    if (age.data < 0) return;

    const result = appointmentRowSchema.safeParse(row);
    if (!result.success) {
      throw new DataUnavailableError(`Dataset row ${index + 1}: ${describeIssues(result.error)}`, {
        cause: result.error,
      });
    }
    records.push(toAppointmentRecord(result.data));
  });

  return Object.freeze(records);
}

export async function loadAppointments(url: string, fetchImpl?: FetchLike): Promise<LoadedDataset> {
  logger.info('[Dataset] Fetching appointments from', url);
  const text = await fetchDatasetCsv(url, fetchImpl);
  const rows = parseDatasetCsv(text);
  const records = cleanAppointments(rows);
  logger.info('[Dataset] Loaded appointments:', { rows: rows.length, kept: records.length });

  return {
    records,
    rawRowCount: rows.length,
    sourceUrl: url,
    loadedAt: new Date().toISOString(),
  };
}
