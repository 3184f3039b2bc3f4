/**
 * backend/src/modules/reports/policies/month-boundaries.policy.ts
 *
 * WHY:
 * - The paid-members graph buckets by calendar month. The range is widened
 *   to whole months first, so a bucket never covers half a month.
 *
 * RULES:
 * - Pure: no IO.
 * - Boundaries = every first-of-month in range, then the last day of the last month.
 * - Consecutive boundaries share an endpoint (both ends are inclusive downstream).
 */

import { eachMonthOfInterval, endOfMonth, startOfMonth } from 'date-fns';

import { fromIsoDate, toIsoDate, type IsoDate } from '../../../shared/time/calendar-date';
import type { ReportPeriod } from '../report.types';

export function buildMonthBoundaries(period: ReportPeriod): IsoDate[] {
  const start = startOfMonth(fromIsoDate(period.start));
  const end = endOfMonth(fromIsoDate(period.end));

  const monthStarts = eachMonthOfInterval({ start, end }).map(toIsoDate);

  return [...monthStarts, toIsoDate(end)];
}

export function toBuckets(boundaries: readonly IsoDate[]): ReportPeriod[] {
  const buckets: ReportPeriod[] = [];

  for (let i = 0; i + 1 < boundaries.length; i++) {
    const start = boundaries[i];
    const end = boundaries[i + 1];
    if (start === undefined || end === undefined) continue;

    buckets.push({ start, end });
  }

  return buckets;
}
