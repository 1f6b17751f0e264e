import { InvalidTransitionError } from '@core/errors/invalid-transition.error.js';
import { ReschedulePolicyError } from '@core/errors/reschedule-policy.error.js';
import type {
  BookingRules,
  Reservation,
  ReservationPatch,
  ReservationStatus,
} from '@core/interfaces/reservation.types.js';

import { minutesBetween } from '@utils/time.js';

export type ReservationAction = 'confirm' | 'reschedule' | 'cancel' | 'complete' | 'mark_no_show';

const OPEN: readonly ReservationStatus[] = ['SCHEDULED', 'CONFIRMED'];

const TRANSITIONS: Record<ReservationAction, { from: readonly ReservationStatus[]; to: ReservationStatus }> =
  {
    confirm: { from: ['SCHEDULED'], to: 'CONFIRMED' },
    reschedule: { from: OPEN, to: 'SCHEDULED' },
    cancel: { from: OPEN, to: 'CANCELLED' },
    complete: { from: OPEN, to: 'COMPLETED' },
    mark_no_show: { from: OPEN, to: 'NO_SHOW' },
  };

export const TERMINAL_STATUSES: readonly ReservationStatus[] = ['COMPLETED', 'CANCELLED', 'NO_SHOW'];

export function isTerminal(status: ReservationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: ReservationStatus, action: ReservationAction): boolean {
  return TRANSITIONS[action].from.includes(from);
}

export interface RescheduleRequest {
  start: Date;
  durationMinutes?: number;
  reason?: string | null;
  notes?: string | null;
}

export class ReservationStateMachine {
  constructor(
    private readonly rules: Pick<BookingRules, 'maxReschedules' | 'rescheduleCutoffMinutes'>,
  ) {}

  /** Returns the status `action` leads to, or throws when `from` does not allow it. */
  next(from: ReservationStatus, action: ReservationAction): ReservationStatus {
    if (!canTransition(from, action)) throw new InvalidTransitionError(from, actionLabel(action));
    return TRANSITIONS[action].to;
  }

  /**
   * Limit and cutoff checks; the cutoff is measured against the reservation's current
   * start, whatever the requested new slot.
   */
  assertReschedulable(current: Reservation, now: Date): void {
    this.next(current.status, 'reschedule');
    if (current.rescheduleCount >= this.rules.maxReschedules) {
      throw new ReschedulePolicyError(
        'max_reschedules',
        `Maximum reschedule limit reached (${this.rules.maxReschedules} reschedules allowed)`,
      );
    }
    if (minutesBetween(now, current.start) <= this.rules.rescheduleCutoffMinutes) {
      throw new ReschedulePolicyError(
        'cutoff',
        `Cannot reschedule within ${this.rules.rescheduleCutoffMinutes} minutes of the reservation start`,
      );
    }
  }

  reschedule(current: Reservation, req: RescheduleRequest, now: Date): ReservationPatch {
    this.assertReschedulable(current, now);
    const patch: ReservationPatch = {
      start: req.start,
      durationMinutes: req.durationMinutes ?? current.durationMinutes,
      status: this.next(current.status, 'reschedule'),
      rescheduleCount: current.rescheduleCount + 1,
    };
    if (req.reason) patch.reason = req.reason;
    if (req.notes) patch.notes = req.notes;
    return patch;
  }

  cancel(current: Reservation, reason: string | null | undefined, now: Date): ReservationPatch {
    const patch: ReservationPatch = {
      status: this.next(current.status, 'cancel'),
      cancelledAt: now,
    };
    if (reason) {
      patch.notes = `${current.notes ?? ''}\nCancellation reason: ${reason}`.trim();
    }
    return patch;
  }

  confirm(current: Reservation): ReservationPatch {
    return { status: this.next(current.status, 'confirm') };
  }

  complete(current: Reservation): ReservationPatch {
    return { status: this.next(current.status, 'complete') };
  }

  markNoShow(current: Reservation): ReservationPatch {
    return { status: this.next(current.status, 'mark_no_show') };
  }
}

function actionLabel(action: ReservationAction): string {
  return action === 'mark_no_show' ? 'mark as no-show' : action;
}
