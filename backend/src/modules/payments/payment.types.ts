/**
 * backend/src/modules/payments/payment.types.ts
 *
 * WHY:
 * - A Payment is one contiguous interval of paid coverage for one member.
 * - The ledger is append-only: payments are never updated or deleted here.
 *
 * RULES:
 * - startDate/endDate are calendar dates (`YYYY-MM-DD`), both inclusive.
 * - "Last payment" means latest paidAt, not latest endDate.
 */

import type { IsoDate } from '../../shared/time/calendar-date';

export type PaymentId = number;

export type Payment = {
  id: PaymentId;
  memberId: number;
  startDate: IsoDate;
  endDate: IsoDate;
  paidAt: Date;
  amount: number | null;
};

export type NewPayment = {
  memberId: number;
  startDate: IsoDate;
  endDate: IsoDate;
  paidAt: Date;
  amount: number | null;
};
