/**
 * backend/src/modules/members/policies/member-status.policy.ts
 *
 * WHY:
 * - The membership payment-status state machine: active / suspended / banned,
 *   how long a member is paid for, and what they owe.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Pass `now` for deterministic tests.
 * - Thresholds come from MemberStatusRules; never inline 14/15/30 here.
 */

import { differenceInCalendarDays, isBefore, subDays, subMonths } from 'date-fns';

import { fromIsoDate, type IsoDate } from '../../../shared/time/calendar-date';
import type { Payment } from '../../payments/payment.types';
import type { Tariff } from '../../tariffs/tariff.types';
import { MEMBER_STATUS_RULES, type MemberStatusRules } from '../member.constants';
import type { Member, MemberStatus } from '../member.types';

type SuspensionFlags = Pick<Member, 'suspended' | 'banned'>;

/** Rounds up to whole cents (ceil to 2 decimals). */
export function ceil2(value: number): number {
  // 16.666666666666668 * 100 must ceil to 1667, but 10 * 100 must stay 1000
  const cents = Math.round(value * 100 * 1e6) / 1e6;
  return Math.ceil(cents) / 100;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function getPaidUntil(lastPayment: Payment | undefined): IsoDate | undefined {
  return lastPayment?.endDate;
}

export function getMonthlyPaymentAmount(tariff: Tariff | undefined): number {
  return tariff?.monthlyPrice ?? 0;
}

/**
 * Outstanding balance projection.
 *
 * Inside the grace window a prorated charge for the unpaid days is added on top
 * of one full month; past it only the monthly amount is due.
 * A paidUntil in the future gives negative unpaid days and therefore a credit.
 */
export function computeExpectedPaymentAmount(params: {
  monthlyAmount: number;
  paidUntil: IsoDate;
  today: Date;
  rules?: MemberStatusRules;
}): number {
  const rules = params.rules ?? MEMBER_STATUS_RULES;
  const unpaidDays = differenceInCalendarDays(params.today, fromIsoDate(params.paidUntil));

  const missingAmount =
    unpaidDays < rules.prorationGraceDays
      ? ceil2((params.monthlyAmount * unpaidDays) / rules.prorationPeriodDays)
      : 0;

  return roundCents(missingAmount + params.monthlyAmount);
}

export function isInactive(member: SuspensionFlags): boolean {
  return member.suspended || member.banned;
}

export function isActive(member: SuspensionFlags): boolean {
  return !isInactive(member);
}

export function isAccessAllowed(member: SuspensionFlags, tariff: Tariff | undefined): boolean {
  return isActive(member) && (tariff?.accessAllowed ?? false);
}

export type SuspensionReason = 'never_paid' | 'payment_overdue';

/**
 * Decides whether the after-save transition must suspend the member.
 * Returns null when nothing changes (already inactive, or paid up).
 */
export function getSuspensionReason(params: {
  member: SuspensionFlags & Pick<Member, 'createdAt'>;
  lastPayment: Payment | undefined;
  now: Date;
  rules?: MemberStatusRules;
}): SuspensionReason | null {
  const { member, lastPayment, now } = params;
  const rules = params.rules ?? MEMBER_STATUS_RULES;

  if (!isActive(member)) return null;

  if (!lastPayment) {
    const neverPaidDeadline = subMonths(now, rules.neverPaidGraceMonths);
    return isBefore(member.createdAt, neverPaidDeadline) ? 'never_paid' : null;
  }

  // paidUntil counts from its local midnight, compared against a full timestamp
  const overdueDeadline = subDays(now, rules.suspensionOverdueDays);
  return isBefore(fromIsoDate(lastPayment.endDate), overdueDeadline) ? 'payment_overdue' : null;
}

export function buildMemberStatus(params: {
  member: SuspensionFlags;
  tariff: Tariff | undefined;
  lastPayment: Payment | undefined;
  now: Date;
  rules?: MemberStatusRules;
}): MemberStatus {
  const { member, tariff, lastPayment, now, rules } = params;

  const paidUntil = getPaidUntil(lastPayment);
  const monthlyPaymentAmount = getMonthlyPaymentAmount(tariff);

  return {
    paidUntil: paidUntil ?? null,
    monthlyPaymentAmount,
    expectedPaymentAmount:
      paidUntil === undefined
        ? null
        : computeExpectedPaymentAmount({ monthlyAmount: monthlyPaymentAmount, paidUntil, today: now, rules }),
    active: isActive(member),
    accessAllowed: isAccessAllowed(member, tariff),
  };
}
