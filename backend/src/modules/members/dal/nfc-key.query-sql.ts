/**
 * backend/src/modules/members/dal/nfc-key.query-sql.ts
 *
 * Hardware key identifiers are managed by the door controller; members only read them.
 */

import type { DbExecutor } from '../../../shared/db/db';

export async function selectNfcKeysByMembersSql(
  db: DbExecutor,
  memberIds: readonly number[],
): Promise<Array<{ member_id: number; key: string }>> {
  if (memberIds.length === 0) return [];

  return db
    .selectFrom('nfc_keys')
    .select(['member_id', 'key'])
    .where('member_id', 'in', memberIds)
    .orderBy('id')
    .execute();
}
