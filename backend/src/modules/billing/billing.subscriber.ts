/**
 * backend/src/modules/billing/billing.subscriber.ts
 *
 * WHY:
 * - Every persisted member gets (or refreshes) a permanent ERIP bill.
 *
 * RULES:
 * - Runs after commit; a failure never undoes the save.
 * - A failure becomes a warning on the save response and an error log line.
 */

import type { Logger } from '../../shared/logger/logger';
import type { EventBus, HandlerOutcome, MemberPersistedEvent } from '../../shared/messaging/events';
import { NO_WARNINGS } from '../../shared/messaging/events';

import { BillingGatewayError, type BillingGateway } from './bepaid-client';
import type { BillingConfig } from './billing.types';
import { buildBillRequest } from './build-bill-request';

export const BILL_CREATION_FAILED_WARNING =
  'Could not create a bill in the payment gateway, check the log';

export function createBillingHandler(deps: {
  gateway: BillingGateway;
  logger: Logger;
  config: Pick<BillingConfig, 'currency' | 'description' | 'notificationUrl' | 'serviceNo'>;
}) {
  return async (event: MemberPersistedEvent): Promise<HandlerOutcome> => {
    const bill = buildBillRequest(event.member, deps.config);

    try {
      const response = await deps.gateway.postBill(bill);

      deps.logger.debug({
        msg: 'billing.bill_created',
        flow: 'billing.create_bill',
        requestId: event.requestId,
        memberId: event.member.id,
        response,
      });

      return NO_WARNINGS;
    } catch (err: unknown) {
      deps.logger.error({
        msg: 'billing.bill_failed',
        flow: 'billing.create_bill',
        requestId: event.requestId,
        memberId: event.member.id,
        message: err instanceof Error ? err.message : String(err),
        status: err instanceof BillingGatewayError ? err.status : undefined,
        httpBody: err instanceof BillingGatewayError ? err.httpBody : undefined,
      });

      return { warnings: [BILL_CREATION_FAILED_WARNING] };
    }
  };
}

export function registerBillingSubscriber(
  bus: EventBus,
  deps: Parameters<typeof createBillingHandler>[0],
) {
  bus.subscribe('member.persisted', createBillingHandler(deps));
}
