import { DateTime } from 'luxon';

export const WORKDAY_START_HOUR = 8;
export const WORKDAY_END_HOUR = 17;
export const SLOT_GAP_MINUTES = 30;
export const DEFAULT_ESTIMATED_HOURS = 2;

export interface Slot {
  start: Date;
  end: Date;
}

export interface SlotInput {
  // Latest scheduled end among the technician's open orders; `now` is used only when there is none.
  latestEnd: Date | null;
  now: Date;
  estimatedHours: number | null;
  timezone: string;
}

const isWeekend = (value: DateTime): boolean => value.weekday === 6 || value.weekday === 7;

const startOfWorkday = (value: DateTime): DateTime =>
  value.set({ hour: WORKDAY_START_HOUR, minute: 0, second: 0, millisecond: 0 });

/**
 * Next start time after `from` that falls inside working hours, evaluated on the wall clock of
 * `timezone`. Weekend days are skipped keeping the time of day.
 */
export const nextWorkingStart = (from: Date, timezone: string): Date => {
  let cursor = DateTime.fromJSDate(from, { zone: timezone }).plus({ minutes: SLOT_GAP_MINUTES });

  if (cursor.hour >= WORKDAY_END_HOUR) {
    cursor = startOfWorkday(cursor.plus({ days: 1 }));
  } else if (cursor.hour < WORKDAY_START_HOUR) {
    cursor = startOfWorkday(cursor);
  }

  while (isWeekend(cursor)) {
    cursor = cursor.plus({ days: 1 });
  }

  return cursor.toJSDate();
};

export const computeSlot = ({ latestEnd, now, estimatedHours, timezone }: SlotInput): Slot => {
  const start = nextWorkingStart(latestEnd ?? now, timezone);
  const hours = estimatedHours && estimatedHours > 0 ? estimatedHours : DEFAULT_ESTIMATED_HOURS;
  const end = DateTime.fromJSDate(start, { zone: timezone }).plus({ minutes: Math.round(hours * 60) });

  return { start, end: end.toJSDate() };
};

/** Start and end of a report's scheduled date: 00:00 to 17:00 local. */
export const reportWindow = (scheduledDate: string, timezone: string): Slot | null => {
  const day = DateTime.fromISO(scheduledDate, { zone: timezone });
  if (!day.isValid) {
    return null;
  }
  const start = day.startOf('day');
  return {
    start: start.toJSDate(),
    end: start.set({ hour: WORKDAY_END_HOUR }).toJSDate()
  };
};

export const isValidTimezone = (timezone: string): boolean => DateTime.local().setZone(timezone).isValid;
