import type {
  ReservationEvent,
  ReservationEventType,
  SlotBoundaries,
} from '@core/interfaces/collaborators.types.js';
import type { Reservation } from '@core/interfaces/reservation.types.js';

import { intervalOf, toUtcIso } from '@utils/time.js';

export function slotOf(r: Pick<Reservation, 'start' | 'durationMinutes'>): SlotBoundaries {
  const { start, end } = intervalOf(r.start, r.durationMinutes);
  return { start: toUtcIso(start), end: toUtcIso(end) };
}

function baseEvent(type: ReservationEventType, r: Reservation): ReservationEvent {
  return {
    type,
    reservationId: r.id,
    requesterId: r.requesterId,
    providerId: r.providerId,
    categoryId: r.categoryId,
    status: r.status,
    version: r.version,
    slot: slotOf(r),
  };
}

export function scheduledEvent(r: Reservation): ReservationEvent {
  return baseEvent('scheduled', r);
}

export function rescheduledEvent(before: Reservation, after: Reservation): ReservationEvent {
  return {
    ...baseEvent('rescheduled', after),
    oldSlot: slotOf(before),
    rescheduleCount: after.rescheduleCount,
  };
}

export function cancelledEvent(r: Reservation): ReservationEvent {
  return {
    ...baseEvent('cancelled', r),
    ...(r.cancelledAt ? { cancelledAt: toUtcIso(r.cancelledAt) } : {}),
  };
}

export function completedEvent(r: Reservation): ReservationEvent {
  return baseEvent('completed', r);
}
