import type { BillingGateway } from '../../src/modules/billing/bepaid-client';
import { BillingGatewayError } from '../../src/modules/billing/bepaid-client';
import type { BillRequest, BillResponse } from '../../src/modules/billing/billing.types';
import type { Notifier } from '../../src/modules/notifications/notifier';

export class RecordingBillingGateway implements BillingGateway {
  readonly bills: BillRequest[] = [];
  private failure: BillingGatewayError | null = null;

  failWith(status: number, httpBody: string): void {
    this.failure = new BillingGatewayError(`bePaid responded with HTTP ${status}`, {
      status,
      httpBody,
    });
  }

  postBill(bill: BillRequest): Promise<BillResponse> {
    this.bills.push(bill);
    if (this.failure) return Promise.reject(this.failure);
    return Promise.resolve({ transaction: { status: 'pending' } });
  }
}

export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];
  private failure: Error | null = null;

  failWith(message: string): void {
    this.failure = new Error(message);
  }

  sendMessageToAll(text: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    this.messages.push(text);
    return Promise.resolve();
  }
}
