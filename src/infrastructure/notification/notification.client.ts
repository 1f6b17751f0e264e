import type { AxiosInstance } from 'axios';

import type { Notifier, ReservationEvent } from '@core/interfaces/collaborators.types.js';

import { isSuccess, toExternalError } from '@infra/http/http.client.js';

import { createLogger } from '@utils/logger.js';

const log = createLogger('notification-client');

function slotBody(slot: { start: string; end: string }) {
  return { start_time: slot.start, end_time: slot.end };
}

export function toWireEvent(event: ReservationEvent): Record<string, unknown> {
  return {
    event_type: event.type,
    reservation_id: event.reservationId,
    requester_id: event.requesterId,
    provider_id: event.providerId,
    category_id: event.categoryId,
    status: event.status,
    version: event.version,
    ...(event.oldSlot
      ? { old_slot: slotBody(event.oldSlot), new_slot: slotBody(event.slot) }
      : { slot: slotBody(event.slot) }),
    ...(event.rescheduleCount !== undefined ? { reschedule_count: event.rescheduleCount } : {}),
    ...(event.cancelledAt ? { cancelled_at: event.cancelledAt } : {}),
  };
}

export class HttpNotifier implements Notifier {
  constructor(
    private readonly http: AxiosInstance,
    private readonly url: string,
  ) {}

  async emit(event: ReservationEvent): Promise<boolean> {
    try {
      const res = await this.http.post(this.url, toWireEvent(event));
      if (!isSuccess(res)) {
        log.warn({ type: event.type, status: res.status }, '[notify] rejected by notification service');
        return false;
      }
      return true;
    } catch (err) {
      const failure = toExternalError('notification', err, 'emit failed');
      log.warn({ type: event.type, reason: failure.message }, '[notify] notification service unreachable');
      return false;
    }
  }
}
