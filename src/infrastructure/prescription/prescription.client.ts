import type { AxiosInstance } from 'axios';
import { z } from 'zod';

import { ExternalServiceError } from '@core/errors/external-service.error.js';
import type {
  PrescriptionClient,
  PrescriptionReceipt,
  PrescriptionRequest,
} from '@core/interfaces/collaborators.types.js';

import { isSuccess, toExternalError } from '@infra/http/http.client.js';

const idLike = z.union([z.string(), z.number()]).transform(String);

const PrescriptionResponse = z
  .object({ prescription_id: idLike.optional(), id: idLike.optional() })
  .refine((b) => b.prescription_id !== undefined || b.id !== undefined, {
    message: 'prescription id missing',
  });

/** The prescription service takes unauthenticated requests. */
export class HttpPrescriptionClient implements PrescriptionClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly url: string,
  ) {}

  async createPrescription(input: PrescriptionRequest): Promise<PrescriptionReceipt> {
    try {
      const res = await this.http.post(this.url, {
        reservation_id: input.reservationId,
        requester_id: input.requesterId,
        provider_id: input.providerId,
        medication: input.medication,
        dosage: input.dosage,
        days: input.days,
      });
      if (!isSuccess(res)) {
        throw new ExternalServiceError('prescription', `Prescription service answered ${res.status}`);
      }
      const body = PrescriptionResponse.safeParse(res.data);
      if (!body.success) {
        throw new ExternalServiceError('prescription', 'Prescription response is malformed');
      }
      return { prescriptionId: body.data.prescription_id ?? body.data.id ?? '' };
    } catch (err) {
      throw toExternalError('prescription', err, 'prescription creation failed');
    }
  }
}
