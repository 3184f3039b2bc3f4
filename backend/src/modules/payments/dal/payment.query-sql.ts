/**
 * backend/src/modules/payments/dal/payment.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for the payment ledger.
 *
 * RULES:
 * - No AppError.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { PaymentsTable } from '../../../shared/db/schema';

export type PaymentRow = Selectable<PaymentsTable>;

export async function selectLastPaymentSql(
  db: DbExecutor,
  memberId: number,
): Promise<PaymentRow | undefined> {
  return db
    .selectFrom('payments')
    .selectAll()
    .where('member_id', '=', memberId)
    .orderBy('paid_at', 'desc')
    .orderBy('id', 'desc')
    .limit(1)
    .executeTakeFirst();
}

/**
 * One row per member: the payment with the latest paid_at.
 */
export async function selectLastPaymentsSql(
  db: DbExecutor,
  memberIds: readonly number[],
): Promise<PaymentRow[]> {
  if (memberIds.length === 0) return [];

  return db
    .selectFrom('payments')
    .selectAll()
    .distinctOn('member_id')
    .where('member_id', 'in', memberIds)
    .orderBy('member_id')
    .orderBy('paid_at', 'desc')
    .orderBy('id', 'desc')
    .execute();
}

export async function selectPaymentsByMemberSql(
  db: DbExecutor,
  memberId: number,
): Promise<PaymentRow[]> {
  return db
    .selectFrom('payments')
    .selectAll()
    .where('member_id', '=', memberId)
    .orderBy('paid_at', 'desc')
    .execute();
}
