/**
 * backend/src/modules/members/queries/member.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into Member domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { IsoDate } from '../../../shared/time/calendar-date';
import {
  selectActiveMembersSql,
  selectAllMembersSql,
  selectMemberByEmailSql,
  selectMemberByIdSql,
  selectMembersPaidWithinSql,
  selectSuspendedSinceSql,
  type MemberRow,
} from '../dal/member.query-sql';
import { selectNfcKeysByMembersSql } from '../dal/nfc-key.query-sql';
import { MEMBER_ROLES, type Member, type MemberRole } from '../member.types';

function isMemberRole(value: string): value is MemberRole {
  return MEMBER_ROLES.some((role) => role === value);
}

function parseRoles(values: readonly string[]): MemberRole[] {
  return values.filter(isMemberRole);
}

export function toMember(row: MemberRow): Member {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    hackerComment: row.hacker_comment,
    bepaidNumber: row.bepaid_number,
    telegramUsername: row.telegram_username,
    aliceGreeting: row.alice_greeting,
    githubUsername: row.github_username,
    sshPublicKey: row.ssh_public_key,
    isLearner: row.is_learner,
    roles: parseRoles(row.roles),

    guarantor1Id: row.guarantor1_id,
    guarantor2Id: row.guarantor2_id,
    tariffId: row.tariff_id,

    suspended: row.account_suspended,
    suspensionChangedAt: row.suspended_changed_at,
    banned: row.account_banned,

    signInCount: row.sign_in_count,
    lastSignInAt: row.last_sign_in_at,
    lastSeenInHackerspace: row.last_seen_in_hackerspace,

    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export async function getMemberById(db: DbExecutor, memberId: number): Promise<Member | undefined> {
  const row = await selectMemberByIdSql(db, memberId);
  if (!row) return undefined;
  return toMember(row);
}

export async function getMemberByEmail(db: DbExecutor, email: string): Promise<Member | undefined> {
  const row = await selectMemberByEmailSql(db, email);
  if (!row) return undefined;
  return toMember(row);
}

export async function listMembers(db: DbExecutor): Promise<Member[]> {
  return (await selectAllMembersSql(db)).map(toMember);
}

export async function listActiveMembers(db: DbExecutor): Promise<Member[]> {
  return (await selectActiveMembersSql(db)).map(toMember);
}

export async function listSuspendedSince(db: DbExecutor, since: Date): Promise<Member[]> {
  return (await selectSuspendedSinceSql(db, since)).map(toMember);
}

export async function listMembersPaidWithin(
  db: DbExecutor,
  params: { start: IsoDate; end: IsoDate },
): Promise<Member[]> {
  return (await selectMembersPaidWithinSql(db, params)).map(toMember);
}

export async function getNfcKeysByMember(
  db: DbExecutor,
  memberIds: readonly number[],
): Promise<Map<number, string[]>> {
  const rows = await selectNfcKeysByMembersSql(db, memberIds);
  const out = new Map<number, string[]>();

  for (const row of rows) {
    const keys = out.get(row.member_id) ?? [];
    keys.push(row.key);
    out.set(row.member_id, keys);
  }

  return out;
}
