/**
 * backend/src/modules/billing/billing.types.ts
 *
 * Shapes of the bePaid "beyag" bill-creation call (ERIP permanent bill).
 */

export type BillingConfig = {
  baseUrl: string;
  shopId: string;
  secret: string;
  serviceNo: number;
  currency: string;
  description: string;
  notificationUrl: string;
};

export type BillRequest = {
  request: {
    /** Minor units (kopecks). */
    amount: number;
    currency: string;
    description: string;
    email: string;
    notification_url: string;
    ip: string;
    order_id: number;
    customer: {
      first_name: string | null;
      last_name: string | null;
    };
    payment_method: {
      type: 'erip';
      account_number: number;
      permanent: 'true';
      editable_amount: 'true';
      service_no: number;
    };
  };
};

export type BillResponse = Record<string, unknown>;
