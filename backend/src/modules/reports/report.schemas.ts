/**
 * backend/src/modules/reports/report.schemas.ts
 */

import { differenceInCalendarMonths } from 'date-fns';
import { z } from 'zod';
import { fromIsoDate, isIsoDate } from '../../shared/time/calendar-date';

/** paid-graph issues one ledger query per month bucket. */
export const REPORT_MAX_MONTHS = 120;

const isoDateField = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD date');

export const reportPeriodQuerySchema = z
  .object({
    start: isoDateField,
    end: isoDateField,
  })
  .refine((v) => v.start <= v.end, {
    message: 'start must not be after end',
    path: ['end'],
  })
  .refine((v) => differenceInCalendarMonths(fromIsoDate(v.end), fromIsoDate(v.start)) < REPORT_MAX_MONTHS, {
    message: `period must span at most ${REPORT_MAX_MONTHS} calendar months`,
    path: ['end'],
  });

export const cohortMemberSchema = z.object({
  id: z.number().int(),
  fullName: z.string(),
  email: z.string(),
});

export const paidGraphPointSchema = z.object({
  date: isoDateField,
  count: z.number().int().nonnegative(),
});

export type ReportPeriodQuery = z.infer<typeof reportPeriodQuerySchema>;
