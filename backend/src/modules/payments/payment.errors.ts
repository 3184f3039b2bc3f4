/**
 * backend/src/modules/payments/payment.errors.ts
 *
 * Payment ledger errors. AppError stays the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PaymentErrors = {
  memberNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Cannot record a payment for an unknown member.', meta);
  },

  invalidInterval(meta?: AppErrorMeta) {
    return AppError.validationError('startDate must not be after endDate', {
      field: 'endDate',
      ...meta,
    });
  },
} as const;
