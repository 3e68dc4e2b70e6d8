/**
 * Zod schemas for the appointment CSV.
 * `rawAppointmentRowSchema` fixes the column set; `appointmentRowSchema`
 * types each cell.
 */

import { z } from 'zod';
import { parseNaiveTimestamp } from './naive-datetime';
import type { BinaryFlag } from './types/appointment';

const cell = z.string();

export const rawAppointmentRowSchema = z.object({
  PatientId: cell,
  AppointmentID: cell,
  Gender: cell,
  ScheduledDay: cell,
  AppointmentDay: cell,
  Age: cell,
  Neighbourhood: cell,
  Scholarship: cell,
  Hipertension: cell,
  Diabetes: cell,
  Alcoholism: cell,
  Handcap: cell,
  SMS_received: cell,
  'No-show': cell,
});

export type RawAppointmentRow = z.infer<typeof rawAppointmentRowSchema>;

export type DatasetColumn = keyof RawAppointmentRow;

export const REQUIRED_COLUMNS: readonly DatasetColumn[] = rawAppointmentRowSchema.keyof().options;

export const integerCell = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'expected an integer')
  .transform((value) => Number(value));

const flagCell = z
  .string()
  .trim()
  .pipe(z.enum(['0', '1']))
  .transform((value): BinaryFlag => (value === '1' ? 1 : 0));

const timestampCell = z
  .string()
  .transform((value, ctx) => {
    const naive = parseNaiveTimestamp(value);
    if (naive === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${value}"` });
      return z.NEVER;
    }
    return naive;
  });

export const appointmentRowSchema = z.object({
  PatientId: z.string().trim().min(1),
  AppointmentID: z.string().trim().min(1),
  Gender: z.string().trim().min(1),
  ScheduledDay: timestampCell,
  AppointmentDay: timestampCell,
  Age: integerCell,
  Neighbourhood: z.string().trim(),
  Scholarship: flagCell,
  Hipertension: flagCell,
  Diabetes: flagCell,
  Alcoholism: flagCell,
  Handcap: integerCell.pipe(z.number().int().min(0)),
  SMS_received: flagCell,
  'No-show': z.string().trim().pipe(z.enum(['Yes', 'No'])),
});

export type AppointmentRow = z.infer<typeof appointmentRowSchema>;
