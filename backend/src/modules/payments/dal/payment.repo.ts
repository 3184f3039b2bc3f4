/**
 * backend/src/modules/payments/dal/payment.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for the payment ledger: append, nothing else.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No update/delete methods.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { NewPayment } from '../payment.types';

export class PaymentRepo {
  constructor(private readonly db: DbExecutor) {}

  async insertPayment(params: NewPayment): Promise<{ id: number }> {
    const row = await this.db
      .insertInto('payments')
      .values({
        member_id: params.memberId,
        start_date: params.startDate,
        end_date: params.endDate,
        paid_at: params.paidAt,
        amount: params.amount,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();

    return { id: row.id };
  }
}
