/**
 * backend/src/modules/members/member.types.ts
 *
 * WHY:
 * - Domain types for the Members module (people and device accounts).
 * - Suspension is engine-owned (written only through the status path);
 *   ban is a manual, engine-independent flag.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

import type { IsoDate } from '../../shared/time/calendar-date';

export type MemberId = number;

export const MEMBER_ROLES = ['hacker', 'admin', 'device'] as const;

export type MemberRole = (typeof MEMBER_ROLES)[number];

export type Member = {
  id: MemberId;
  email: string;
  firstName: string | null;
  lastName: string | null;
  hackerComment: string | null;
  bepaidNumber: number | null;
  telegramUsername: string | null;
  aliceGreeting: string | null;
  githubUsername: string | null;
  sshPublicKey: string | null;
  isLearner: boolean;
  roles: MemberRole[];

  guarantor1Id: MemberId | null;
  guarantor2Id: MemberId | null;
  tariffId: number | null;

  suspended: boolean;
  suspensionChangedAt: Date | null;
  banned: boolean;

  signInCount: number;
  lastSignInAt: Date | null;
  lastSeenInHackerspace: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * Fields the profile write path may set. Everything engine-owned
 * (suspension) or tracked elsewhere (sign-in stats, timestamps) is excluded.
 */
export type MemberProfile = {
  email: string;
  firstName: string | null;
  lastName: string | null;
  hackerComment: string | null;
  bepaidNumber: number | null;
  telegramUsername: string | null;
  aliceGreeting: string | null;
  githubUsername: string | null;
  sshPublicKey: string | null;
  isLearner: boolean;
  roles: MemberRole[];
  guarantor1Id: MemberId | null;
  guarantor2Id: MemberId | null;
  tariffId: number | null;
  banned: boolean;
};

export type MemberProfilePatch = Partial<MemberProfile>;

/** Input of the status write path. */
export type SuspensionChange = {
  suspended: boolean;
  changedAt: Date;
};

/** Derived, never stored. */
export type MemberStatus = {
  paidUntil: IsoDate | null;
  monthlyPaymentAmount: number;
  /** null when the member has never paid (nothing to project from). */
  expectedPaymentAmount: number | null;
  active: boolean;
  accessAllowed: boolean;
};

export type MemberView = Member & MemberStatus & { fullName: string };

/** Slim member shape used in cohort reports (JSON-cacheable). */
export type CohortMember = {
  id: MemberId;
  fullName: string;
  email: string;
};
