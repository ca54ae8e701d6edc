import { AcledValidationError } from './types';

/**
 * ACLED release calendar.
 *
 * ACLED publishes every Wednesday. Weeks run Monday to Sunday: on Monday and
 * Tuesday the newest dataset ends on last week's Friday, from Wednesday on it
 * ends on this week's Friday.
 *
 * All arithmetic is in UTC.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const FRIDAY_OFFSET = 4; // Monday = 0

function parseIsoDate(value: string): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new AcledValidationError('date', '`date` must be a Date or a YYYY-MM-DD string.');
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // Date.UTC rolls 2024-02-30 over into March
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    throw new AcledValidationError('date', `\`date\` is not a valid calendar date: ${value}`);
  }

  return date;
}

function toUtcMidnight(date: Date): Date {
  if (Number.isNaN(date.getTime())) {
    throw new AcledValidationError('date', '`date` is an invalid Date.');
  }
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Friday end date of the latest available ACLED dataset.
 *
 * @example
 * getAcledEndDate('2024-03-11'); // Monday    -> 2024-03-08
 * getAcledEndDate('2024-03-13'); // Wednesday -> 2024-03-15
 */
export function getAcledEndDate(date: Date | string = new Date()): Date {
  const reference = typeof date === 'string' ? parseIsoDate(date) : toUtcMidnight(date);

  const daysSinceMonday = (reference.getUTCDay() + 6) % 7;
  const friday = new Date(reference);
  friday.setUTCDate(reference.getUTCDate() - daysSinceMonday + FRIDAY_OFFSET);

  // Monday or Tuesday: this week's release is not out yet
  if (daysSinceMonday < 2) {
    friday.setUTCDate(friday.getUTCDate() - 7);
  }

  return friday;
}

/**
 * Same as {@link getAcledEndDate}, formatted as YYYY-MM-DD for use in `eventDate` filters.
 */
export function getAcledEndDateString(date?: Date | string): string {
  return getAcledEndDate(date).toISOString().slice(0, 10);
}
