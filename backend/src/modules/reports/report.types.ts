/**
 * backend/src/modules/reports/report.types.ts
 */

import type { IsoDate } from '../../shared/time/calendar-date';
import type { CohortMember } from '../members';

export type { CohortMember };

export type DebtorMember = CohortMember & {
  paidUntil: IsoDate;
};

export type PaidGraphPoint = {
  /** First day of the bucket. */
  date: IsoDate;
  count: number;
};

export type ReportPeriod = {
  start: IsoDate;
  end: IsoDate;
};
