import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { ExternalServiceError } from '@core/errors/external-service.error.js';
import type { BillingClient, BillReceipt } from '@core/interfaces/collaborators.types.js';

import { isSuccess, toExternalError } from '@infra/http/http.client.js';

const BillResponse = z.object({
  bill_id: z.union([z.string(), z.number()]).transform(String),
  total_amount: z.coerce.number(),
});

export class HttpBillingClient implements BillingClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly url: string,
  ) {}

  async createBill(input: {
    requesterId: string;
    reservationId: string;
    consultationFee: number;
    medicationFee: number;
  }): Promise<BillReceipt> {
    try {
      const res = await this.http.post(this.url, {
        requester_id: input.requesterId,
        reservation_id: input.reservationId,
        consultation_fee: input.consultationFee,
        medication_fee: input.medicationFee,
      });
      if (!isSuccess(res)) {
        throw new ExternalServiceError('billing', `Billing answered ${res.status}`);
      }
      const body = BillResponse.safeParse(res.data);
      if (!body.success) throw new ExternalServiceError('billing', 'Billing response is malformed');
      return { billId: body.data.bill_id, totalAmount: body.data.total_amount };
    } catch (err) {
      throw toExternalError('billing', err, 'bill creation failed');
    }
  }
}
