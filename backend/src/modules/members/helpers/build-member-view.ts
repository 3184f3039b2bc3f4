/**
 * backend/src/modules/members/helpers/build-member-view.ts
 *
 * Joins a member with its derived status for API responses.
 */

import type { Payment } from '../../payments/payment.types';
import type { Tariff } from '../../tariffs/tariff.types';
import type { MemberStatusRules } from '../member.constants';
import type { CohortMember, Member, MemberView } from '../member.types';
import { buildMemberStatus } from '../policies/member-status.policy';
import { fullName } from './member-names';

export function buildMemberView(params: {
  member: Member;
  tariff: Tariff | undefined;
  lastPayment: Payment | undefined;
  now: Date;
  rules: MemberStatusRules;
}): MemberView {
  return {
    ...params.member,
    ...buildMemberStatus(params),
    fullName: fullName(params.member),
  };
}

export function toCohortMember(member: Member): CohortMember {
  return {
    id: member.id,
    fullName: fullName(member),
    email: member.email,
  };
}
