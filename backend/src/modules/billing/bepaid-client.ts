/**
 * backend/src/modules/billing/bepaid-client.ts
 *
 * WHY:
 * - BillingGateway is the seam the subscriber depends on; tests bind a recording fake.
 *
 * RULES:
 * - One attempt per call. No retries.
 * - Non-2xx responses throw BillingGatewayError carrying the raw body for the log.
 */

import { z } from 'zod';

import type { BillingConfig, BillRequest, BillResponse } from './billing.types';

export interface BillingGateway {
  postBill(bill: BillRequest): Promise<BillResponse>;
}

export class BillingGatewayError extends Error {
  readonly status: number | null;
  readonly httpBody: string | null;

  constructor(message: string, opts: { status?: number; httpBody?: string } = {}) {
    super(message);
    this.name = 'BillingGatewayError';
    this.status = opts.status ?? null;
    this.httpBody = opts.httpBody ?? null;
  }
}

const billResponseSchema = z.record(z.unknown());

export class BePaidClient implements BillingGateway {
  private readonly authorization: string;

  constructor(private readonly config: Pick<BillingConfig, 'baseUrl' | 'shopId' | 'secret'>) {
    const credentials = Buffer.from(`${config.shopId}:${config.secret}`).toString('base64');
    this.authorization = `Basic ${credentials}`;
  }

  async postBill(bill: BillRequest): Promise<BillResponse> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/beyag/payments`;

    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        Authorization: this.authorization,
      },
      body: JSON.stringify(bill),
    });

    const text = await response.text();

    if (!response.ok) {
      throw new BillingGatewayError(`bePaid responded with HTTP ${response.status}`, {
        status: response.status,
        httpBody: text,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new BillingGatewayError('bePaid returned a non-JSON body', {
        status: response.status,
        httpBody: text,
      });
    }

    const parsed = billResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new BillingGatewayError('bePaid returned an unexpected body', {
        status: response.status,
        httpBody: text,
      });
    }

    return parsed.data;
  }
}
