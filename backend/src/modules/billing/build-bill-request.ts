/**
 * backend/src/modules/billing/build-bill-request.ts
 *
 * RULES:
 * - Pure.
 * - The ERIP account number is the member id, so a member always pays into
 *   the same permanent bill and can change the amount.
 */

import type { MemberPersistedEvent } from '../../shared/messaging/events';
import type { BillingConfig, BillRequest } from './billing.types';

const BILL_REQUEST_IP = '127.0.0.1';

export function buildBillRequest(
  member: MemberPersistedEvent['member'],
  config: Pick<BillingConfig, 'currency' | 'description' | 'notificationUrl' | 'serviceNo'>,
): BillRequest {
  return {
    request: {
      amount: Math.round(member.monthlyPaymentAmount * 100),
      currency: config.currency,
      description: config.description,
      email: member.email,
      notification_url: config.notificationUrl,
      ip: BILL_REQUEST_IP,
      order_id: member.id,
      customer: {
        first_name: member.firstName,
        last_name: member.lastName,
      },
      payment_method: {
        type: 'erip',
        account_number: member.id,
        permanent: 'true',
        editable_amount: 'true',
        service_no: config.serviceNo,
      },
    },
  };
}
