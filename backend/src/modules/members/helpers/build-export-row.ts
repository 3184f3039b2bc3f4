/**
 * backend/src/modules/members/helpers/build-export-row.ts
 *
 * WHY:
 * - Spreadsheet/CSV consumers rely on a fixed, ordered field list per member.
 *   Serialization to CSV is the presentation layer's job; this only shapes rows.
 *
 * RULES:
 * - Field order below is the contract. Append, never reorder.
 * - Guarantors render as "<id>. <first> <last>".
 * - NFC keys are joined with a single space.
 */

import type { IsoDate } from '../../../shared/time/calendar-date';
import type { Member } from '../member.types';
import { fullNameWithId } from './member-names';

export type MemberExportRow = {
  id: number;
  firstName: string | null;
  lastName: string | null;
  email: string;
  hackerComment: string | null;
  bepaidNumber: number | null;
  monthlyPaymentAmount: number;
  signInCount: number;
  lastSignInAt: string | null;
  createdAt: string;
  lastSeenInHackerspace: string | null;
  telegramUsername: string | null;
  aliceGreeting: string | null;
  accountSuspended: boolean;
  accountBanned: boolean;
  githubUsername: string | null;
  isLearner: boolean;
  guarantor1: string | null;
  guarantor2: string | null;
  paidUntil: IsoDate | null;
  nfcKeys?: string;
};

export function buildMemberExportRow(params: {
  member: Member;
  monthlyPaymentAmount: number;
  paidUntil: IsoDate | null;
  guarantor1: Member | undefined;
  guarantor2: Member | undefined;
  /** Present only for the "with NFC" export variant. */
  nfcKeys?: readonly string[];
}): MemberExportRow {
  const { member } = params;

  const row: MemberExportRow = {
    id: member.id,
    firstName: member.firstName,
    lastName: member.lastName,
    email: member.email,
    hackerComment: member.hackerComment,
    bepaidNumber: member.bepaidNumber,
    monthlyPaymentAmount: params.monthlyPaymentAmount,
    signInCount: member.signInCount,
    lastSignInAt: member.lastSignInAt?.toISOString() ?? null,
    createdAt: member.createdAt.toISOString(),
    lastSeenInHackerspace: member.lastSeenInHackerspace?.toISOString() ?? null,
    telegramUsername: member.telegramUsername,
    aliceGreeting: member.aliceGreeting,
    accountSuspended: member.suspended,
    accountBanned: member.banned,
    githubUsername: member.githubUsername,
    isLearner: member.isLearner,
    guarantor1: params.guarantor1 ? fullNameWithId(params.guarantor1) : null,
    guarantor2: params.guarantor2 ? fullNameWithId(params.guarantor2) : null,
    paidUntil: params.paidUntil,
  };

  if (params.nfcKeys) {
    row.nfcKeys = params.nfcKeys.join(' ');
  }

  return row;
}
