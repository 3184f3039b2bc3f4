/**
 * backend/src/modules/billing/index.ts
 */

export { BePaidClient, BillingGatewayError, type BillingGateway } from './bepaid-client';
export { BILL_CREATION_FAILED_WARNING, registerBillingSubscriber } from './billing.subscriber';
export type { BillingConfig, BillRequest, BillResponse } from './billing.types';
