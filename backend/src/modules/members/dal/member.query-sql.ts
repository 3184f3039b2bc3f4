/**
 * backend/src/modules/members/dal/member.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for members, including the cohort queries behind reports.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MembersTable } from '../../../shared/db/schema';
import type { IsoDate } from '../../../shared/time/calendar-date';

export type MemberRow = Selectable<MembersTable>;

export async function selectMemberByIdSql(
  db: DbExecutor,
  memberId: number,
): Promise<MemberRow | undefined> {
  return db.selectFrom('members').selectAll().where('id', '=', memberId).executeTakeFirst();
}

export async function selectMemberByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<MemberRow | undefined> {
  return db
    .selectFrom('members')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectAllMembersSql(db: DbExecutor): Promise<MemberRow[]> {
  return db.selectFrom('members').selectAll().orderBy('id').execute();
}

/**
 * Not suspended, not banned, and either paid at least once or signed in at least once.
 */
export async function selectActiveMembersSql(db: DbExecutor): Promise<MemberRow[]> {
  return db
    .selectFrom('members')
    .selectAll('members')
    .where('members.account_suspended', '=', false)
    .where('members.account_banned', '=', false)
    .where((eb) =>
      eb.or([
        eb('members.last_sign_in_at', 'is not', null),
        eb.exists(
          eb
            .selectFrom('payments')
            .select('payments.id')
            .whereRef('payments.member_id', '=', 'members.id'),
        ),
      ]),
    )
    .orderBy('members.id')
    .execute();
}

export async function selectSuspendedSinceSql(
  db: DbExecutor,
  since: Date,
): Promise<MemberRow[]> {
  return db
    .selectFrom('members')
    .selectAll()
    .where('account_suspended', '=', true)
    .where('suspended_changed_at', '>', since)
    .orderBy('id')
    .execute();
}

/**
 * Members with at least one payment interval overlapping [start, end] (inclusive).
 */
export async function selectMembersPaidWithinSql(
  db: DbExecutor,
  params: { start: IsoDate; end: IsoDate },
): Promise<MemberRow[]> {
  return db
    .selectFrom('members')
    .selectAll('members')
    .where((eb) =>
      eb.exists(
        eb
          .selectFrom('payments')
          .select('payments.id')
          .whereRef('payments.member_id', '=', 'members.id')
          .where('payments.start_date', '<=', params.end)
          .where('payments.end_date', '>=', params.start),
      ),
    )
    .orderBy('members.id')
    .execute();
}
