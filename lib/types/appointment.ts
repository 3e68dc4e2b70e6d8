export type NoShowLabel = 'Yes' | 'No';

export type BinaryFlag = 0 | 1;

export type FlagLabel = '0' | '1';

export type Weekday =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

/**
 * One scheduled appointment after cleaning.
 *
 * Timestamps are timezone-naive `YYYY-MM-DDTHH:mm:ss` strings: the wall-clock
 * value of the source column with any offset dropped.
 */
export interface AppointmentRecord {
  readonly patientId: string;
  readonly appointmentId: string;
  readonly gender: string;
  readonly scheduledDay: string;
  readonly appointmentDay: string;
  readonly age: number;
  readonly neighbourhood: string;
  readonly scholarship: BinaryFlag;
  readonly hypertension: BinaryFlag;
  readonly diabetes: BinaryFlag;
  readonly alcoholism: BinaryFlag;
  readonly handicap: number;
  readonly smsReceived: BinaryFlag;
  /** `Yes` means the patient did not attend. */
  readonly noShow: NoShowLabel;

  readonly waitingDays: number;
  readonly appointmentWeekday: Weekday;
  readonly noShowFlag: BinaryFlag;
  readonly scholarshipLabel: FlagLabel;
  readonly hypertensionLabel: FlagLabel;
  readonly diabetesLabel: FlagLabel;
  readonly alcoholismLabel: FlagLabel;
  readonly smsReceivedLabel: FlagLabel;
}
