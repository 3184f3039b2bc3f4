/**
 * backend/src/modules/payments/queries/payment.queries.ts
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectLastPaymentSql,
  selectLastPaymentsSql,
  selectPaymentsByMemberSql,
  type PaymentRow,
} from '../dal/payment.query-sql';
import type { Payment } from '../payment.types';

export function toPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    memberId: row.member_id,
    startDate: row.start_date,
    endDate: row.end_date,
    paidAt: row.paid_at,
    amount: row.amount === null ? null : Number(row.amount),
  };
}

export async function getLastPayment(
  db: DbExecutor,
  memberId: number,
): Promise<Payment | undefined> {
  const row = await selectLastPaymentSql(db, memberId);
  if (!row) return undefined;
  return toPayment(row);
}

export async function getLastPaymentsByMember(
  db: DbExecutor,
  memberIds: readonly number[],
): Promise<Map<number, Payment>> {
  const rows = await selectLastPaymentsSql(db, memberIds);
  return new Map(rows.map((row) => [row.member_id, toPayment(row)]));
}

export async function listPaymentsForMember(db: DbExecutor, memberId: number): Promise<Payment[]> {
  const rows = await selectPaymentsByMemberSql(db, memberId);
  return rows.map(toPayment);
}
