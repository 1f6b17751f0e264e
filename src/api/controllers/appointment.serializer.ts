import type { Reservation } from '@core/interfaces/reservation.types.js';

import type { CompletionOutcome } from '@services/booking/completion.orchestrator.js';

import { intervalOf, toUtcIso } from '@utils/time.js';

export function toAppointmentJson(r: Reservation) {
  return {
    id: r.id,
    requester_id: r.requesterId,
    provider_id: r.providerId,
    category_id: r.categoryId,
    start: toUtcIso(r.start),
    end: toUtcIso(intervalOf(r.start, r.durationMinutes).end),
    duration_minutes: r.durationMinutes,
    status: r.status,
    reschedule_count: r.rescheduleCount,
    version: r.version,
    reason: r.reason,
    notes: r.notes,
    created_at: toUtcIso(r.createdAt),
    updated_at: toUtcIso(r.updatedAt),
    cancelled_at: r.cancelledAt ? toUtcIso(r.cancelledAt) : null,
  };
}

export function toCompletionJson(outcome: CompletionOutcome) {
  const { billing, prescription } = outcome;
  return {
    message: 'Appointment marked as completed',
    appointment: toAppointmentJson(outcome.reservation),
    bill_created: billing.created,
    bill_id: billing.billId,
    total_amount: billing.totalAmount,
    prescription_created: prescription.created,
    prescription: {
      prescription_id: prescription.prescriptionId,
      medication: prescription.medication,
      dosage: prescription.dosage,
      days: prescription.days,
    },
    notified: outcome.notified,
  };
}
