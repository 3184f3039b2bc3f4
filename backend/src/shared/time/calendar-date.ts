/**
 * backend/src/shared/time/calendar-date.ts
 *
 * Payment intervals are calendar dates (no time, no zone) and travel as
 * `YYYY-MM-DD` strings end to end: pg returns `date` columns unparsed (see db.ts),
 * and ISO dates compare correctly as plain strings.
 */

import { format, isValid, parseISO } from 'date-fns';

/** `YYYY-MM-DD` */
export type IsoDate = string;

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function toIsoDate(date: Date): IsoDate {
  return format(date, 'yyyy-MM-dd');
}

/** Local midnight of the given calendar date. */
export function fromIsoDate(value: IsoDate): Date {
  return parseISO(value);
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE_RE.test(value) && isValid(parseISO(value));
}
