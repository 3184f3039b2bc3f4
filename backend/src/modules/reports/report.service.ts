/**
 * backend/src/modules/reports/report.service.ts
 *
 * WHY:
 * - Read-only cohort views over members and the payment ledger.
 *
 * RULES:
 * - No writes.
 * - Period cohorts go through CohortCache; the current-state cohorts
 *   (active, with debt, suspended today) are always computed fresh.
 */

import { subDays } from 'date-fns';
import { z } from 'zod';

import { toIsoDate } from '../../shared/time/calendar-date';
import { getPaidUntil, toCohortMember, type CohortMember, type MemberStore } from '../members';

import type { CohortCache } from './cohort-cache';
import { buildMonthBoundaries, toBuckets } from './policies/month-boundaries.policy';
import { cohortMemberSchema, paidGraphPointSchema } from './report.schemas';
import type { DebtorMember, PaidGraphPoint, ReportPeriod } from './report.types';

export class ReportService {
  constructor(
    private readonly store: MemberStore,
    private readonly cohortCache: CohortCache,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async listActive(): Promise<CohortMember[]> {
    const members = await this.store.listActiveMembers();
    return members.map(toCohortMember);
  }

  /** Active members whose coverage ended before today. */
  async listWithDebt(): Promise<DebtorMember[]> {
    const today = toIsoDate(this.now());

    const members = await this.store.listActiveMembers();
    const lastPayments = await this.store.getLastPayments(members.map((m) => m.id));

    const debtors: DebtorMember[] = [];
    for (const member of members) {
      const paidUntil = getPaidUntil(lastPayments.get(member.id));
      if (paidUntil === undefined || paidUntil >= today) continue;

      debtors.push({ ...toCohortMember(member), paidUntil });
    }

    return debtors;
  }

  async listSuspendedToday(): Promise<CohortMember[]> {
    const members = await this.store.listSuspendedSince(subDays(this.now(), 1));
    return members.map(toCohortMember);
  }

  paidWithinPeriod(period: ReportPeriod): Promise<CohortMember[]> {
    return this.cohortCache.getOrLoad({
      kind: 'paid-within',
      period,
      schema: z.array(cohortMemberSchema),
      load: () => this.loadPaidWithin(period),
    });
  }

  paidUsersGraph(period: ReportPeriod): Promise<PaidGraphPoint[]> {
    return this.cohortCache.getOrLoad({
      kind: 'paid-graph',
      period,
      schema: z.array(paidGraphPointSchema),
      load: async () => {
        const points: PaidGraphPoint[] = [];

        for (const bucket of toBuckets(buildMonthBoundaries(period))) {
          const members = await this.paidWithinPeriod(bucket);
          points.push({ date: bucket.start, count: members.length });
        }

        return points;
      },
    });
  }

  private async loadPaidWithin(period: ReportPeriod): Promise<CohortMember[]> {
    const members = await this.store.listMembersPaidWithin(period);
    return members.map(toCohortMember);
  }
}
