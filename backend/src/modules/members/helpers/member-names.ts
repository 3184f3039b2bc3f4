/**
 * backend/src/modules/members/helpers/member-names.ts
 *
 * Display names used by exports, reports and chat notifications.
 */

import type { Member } from '../member.types';

type NamedMember = Pick<Member, 'id' | 'firstName' | 'lastName'>;

export function fullName(member: Pick<Member, 'firstName' | 'lastName'>): string {
  return `${member.firstName ?? ''} ${member.lastName ?? ''}`;
}

export function fullNameWithId(member: NamedMember): string {
  return `${member.id}. ${fullName(member)}`;
}

export function telegramHandleSuffix(telegramUsername: string | null): string {
  return telegramUsername ? ` @${telegramUsername}` : '';
}
