/**
 * backend/src/modules/members/flows/apply-suspension-transition.ts
 *
 * WHY:
 * - Runs after every profile save: an active member who never paid within the
 *   grace months, or whose last payment ran out too long ago, gets suspended.
 * - Idempotent: an already suspended/banned member is left alone.
 *
 * RULES:
 * - Uses the status write path only (setMemberSuspension), so it can never
 *   re-trigger itself or the profile validation.
 * - Receives a trx-bound store (caller owns the transaction).
 */

import type { Logger } from '../../../shared/logger/logger';
import type { MemberStatusRules } from '../member.constants';
import type { MemberStore } from '../member.store';
import type { Member } from '../member.types';
import { getSuspensionReason } from '../policies/member-status.policy';

export async function applySuspensionTransition(params: {
  store: MemberStore;
  member: Member;
  now: Date;
  rules: MemberStatusRules;
  logger: Logger;
  requestId: string | null;
}): Promise<Member> {
  const { store, member, now, rules } = params;

  const lastPayment = await store.getLastPayment(member.id);
  const reason = getSuspensionReason({ member, lastPayment, now, rules });

  if (!reason) return member;

  await store.setMemberSuspension(member.id, { suspended: true, changedAt: now });

  params.logger.info({
    msg: 'members.suspended',
    flow: 'members.suspension',
    requestId: params.requestId,
    memberId: member.id,
    reason,
    paidUntil: lastPayment?.endDate ?? null,
  });

  return { ...member, suspended: true, suspensionChangedAt: now };
}
