/**
 * backend/src/modules/members/index.ts
 *
 * WHY:
 * - Public surface of the members module.
 * - Prevents cross-module coupling via deep imports into /queries or /dal.
 */

export { toCohortMember } from './helpers/build-member-view';
export { telegramHandleSuffix } from './helpers/member-names';
export { getPaidUntil } from './policies/member-status.policy';
export { MEMBER_STATUS_RULES, type MemberStatusRules } from './member.constants';
export { createMemberModule, type MemberModule } from './member.module';
export type { MemberStore } from './member.store';
export type { CohortMember, Member, MemberView } from './member.types';
