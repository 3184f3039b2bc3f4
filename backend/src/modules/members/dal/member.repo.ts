/**
 * backend/src/modules/members/dal/member.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for members.
 * - Two distinct write paths:
 *   - updateProfile(): general-purpose save, bumps updated_at.
 *   - setSuspension(): status engine only. Touches the two suspension columns
 *     and nothing else, so it never counts as a profile save.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 */

import type { Insertable, Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MembersTable } from '../../../shared/db/schema';
import type { MemberProfile, MemberProfilePatch, SuspensionChange } from '../member.types';
import type { MemberRow } from './member.query-sql';

function toProfileColumns(patch: MemberProfilePatch): Updateable<MembersTable> {
  const columns: Updateable<MembersTable> = {};

  if (patch.email !== undefined) columns.email = patch.email.toLowerCase();
  if (patch.firstName !== undefined) columns.first_name = patch.firstName;
  if (patch.lastName !== undefined) columns.last_name = patch.lastName;
  if (patch.hackerComment !== undefined) columns.hacker_comment = patch.hackerComment;
  if (patch.bepaidNumber !== undefined) columns.bepaid_number = patch.bepaidNumber;
  if (patch.telegramUsername !== undefined) columns.telegram_username = patch.telegramUsername;
  if (patch.aliceGreeting !== undefined) columns.alice_greeting = patch.aliceGreeting;
  if (patch.githubUsername !== undefined) columns.github_username = patch.githubUsername;
  if (patch.sshPublicKey !== undefined) columns.ssh_public_key = patch.sshPublicKey;
  if (patch.isLearner !== undefined) columns.is_learner = patch.isLearner;
  if (patch.roles !== undefined) columns.roles = patch.roles;
  if (patch.guarantor1Id !== undefined) columns.guarantor1_id = patch.guarantor1Id;
  if (patch.guarantor2Id !== undefined) columns.guarantor2_id = patch.guarantor2Id;
  if (patch.tariffId !== undefined) columns.tariff_id = patch.tariffId;
  if (patch.banned !== undefined) columns.account_banned = patch.banned;

  return columns;
}

export class MemberRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Email must be unique (enforced by DB constraint); the service checks first
   * to return a friendly CONFLICT.
   */
  async insertMember(profile: MemberProfile): Promise<MemberRow> {
    const values: Insertable<MembersTable> = {
      email: profile.email.toLowerCase(),
      first_name: profile.firstName,
      last_name: profile.lastName,
      hacker_comment: profile.hackerComment,
      bepaid_number: profile.bepaidNumber,
      telegram_username: profile.telegramUsername,
      alice_greeting: profile.aliceGreeting,
      github_username: profile.githubUsername,
      ssh_public_key: profile.sshPublicKey,
      is_learner: profile.isLearner,
      roles: profile.roles,
      guarantor1_id: profile.guarantor1Id,
      guarantor2_id: profile.guarantor2Id,
      tariff_id: profile.tariffId,
      account_banned: profile.banned,
    };

    return this.db.insertInto('members').values(values).returningAll().executeTakeFirstOrThrow();
  }

  async updateProfile(params: {
    memberId: number;
    patch: MemberProfilePatch;
    updatedAt: Date;
  }): Promise<MemberRow | undefined> {
    return this.db
      .updateTable('members')
      .set({ ...toProfileColumns(params.patch), updated_at: params.updatedAt })
      .where('id', '=', params.memberId)
      .returningAll()
      .executeTakeFirst();
  }

  /**
   * Status write path. Returns true if the row exists.
   */
  async setSuspension(params: { memberId: number; change: SuspensionChange }): Promise<boolean> {
    const res = await this.db
      .updateTable('members')
      .set({
        account_suspended: params.change.suspended,
        suspended_changed_at: params.change.changedAt,
      })
      .where('id', '=', params.memberId)
      .executeTakeFirst();

    return Number(res?.numUpdatedRows ?? 0) > 0;
  }
}
