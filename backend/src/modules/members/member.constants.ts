/**
 * backend/src/modules/members/member.constants.ts
 *
 * Status engine thresholds.
 *
 * prorationGraceDays and suspensionOverdueDays are independent business rules
 * (14 vs 15). Do not derive one from the other.
 */

export type MemberStatusRules = {
  /** Overdue days below which a prorated top-up is added to the monthly amount. */
  prorationGraceDays: number;
  /** Divisor turning a monthly price into a daily one. */
  prorationPeriodDays: number;
  /** Days past paidUntil after which an active member is suspended. */
  suspensionOverdueDays: number;
  /** Months a member may exist without any payment before suspension. */
  neverPaidGraceMonths: number;
};

export const MEMBER_STATUS_RULES: Readonly<MemberStatusRules> = Object.freeze({
  prorationGraceDays: 14,
  prorationPeriodDays: 30,
  suspensionOverdueDays: 15,
  neverPaidGraceMonths: 1,
});

export const MEMBER_EMAIL_MAX_LENGTH = 255;
