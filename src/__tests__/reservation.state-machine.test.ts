import { describe, it, expect } from 'vitest';

import { InvalidTransitionError } from '@core/errors/invalid-transition.error.js';
import { ReschedulePolicyError } from '@core/errors/reschedule-policy.error.js';
import type { Reservation } from '@core/interfaces/reservation.types.js';

import {
  ReservationStateMachine,
  canTransition,
  isTerminal,
} from '@services/booking/reservation.state-machine.js';

import { NOW, at } from '@test/utils/fakes.js';

const machine = new ReservationStateMachine({ maxReschedules: 2, rescheduleCutoffMinutes: 60 });

function reservation(overrides: Partial<Reservation> = {}): Reservation {
  return {
    id: 'res-1',
    requesterId: 'req-1',
    providerId: 'prov-1',
    categoryId: 'cardiology',
    start: at('10:00'),
    durationMinutes: 30,
    status: 'SCHEDULED',
    rescheduleCount: 0,
    version: 1,
    reason: null,
    notes: null,
    createdAt: NOW,
    updatedAt: NOW,
    cancelledAt: null,
    ...overrides,
  };
}

describe('transition table', () => {
  it('allows the open states to move', () => {
    expect(canTransition('SCHEDULED', 'confirm')).toBe(true);
    expect(canTransition('CONFIRMED', 'confirm')).toBe(false);
    expect(canTransition('CONFIRMED', 'reschedule')).toBe(true);
    expect(canTransition('CONFIRMED', 'complete')).toBe(true);
    expect(canTransition('SCHEDULED', 'mark_no_show')).toBe(true);
  });

  it.each(['COMPLETED', 'CANCELLED', 'NO_SHOW'] as const)('%s is terminal', (status) => {
    expect(isTerminal(status)).toBe(true);
    for (const action of ['confirm', 'reschedule', 'cancel', 'complete', 'mark_no_show'] as const) {
      expect(canTransition(status, action)).toBe(false);
    }
  });

  it('names the action in the error', () => {
    expect(() => machine.markNoShow(reservation({ status: 'CANCELLED' }))).toThrow(
      'Cannot mark as no-show a reservation with status CANCELLED',
    );
    expect(() => machine.complete(reservation({ status: 'COMPLETED' }))).toThrow(
      InvalidTransitionError,
    );
  });
});

describe('reschedule policy', () => {
  it('builds a patch that resets the status and bumps the counter', () => {
    const patch = machine.reschedule(
      reservation({ status: 'CONFIRMED', rescheduleCount: 1 }),
      { start: at('12:00'), reason: 'clash' },
      NOW,
    );
    expect(patch).toEqual({
      start: at('12:00'),
      durationMinutes: 30,
      status: 'SCHEDULED',
      rescheduleCount: 2,
      reason: 'clash',
    });
  });

  it('refuses once the limit is reached', () => {
    expect(() =>
      machine.reschedule(reservation({ rescheduleCount: 2 }), { start: at('12:00') }, NOW),
    ).toThrow(ReschedulePolicyError);
  });

  it('refuses at or inside the cutoff, measured from the current start', () => {
    const sixtyAway = reservation({ start: at('09:00') });
    const sixtyOneAway = reservation({ start: at('09:01') });
    expect(() => machine.assertReschedulable(sixtyAway, NOW)).toThrow(
      'Cannot reschedule within 60 minutes of the reservation start',
    );
    expect(() => machine.assertReschedulable(sixtyOneAway, NOW)).not.toThrow();
  });

  it('checks the status before the policy', () => {
    expect(() =>
      machine.reschedule(
        reservation({ status: 'CANCELLED', rescheduleCount: 2 }),
        { start: at('12:00') },
        NOW,
      ),
    ).toThrow(InvalidTransitionError);
  });
});

describe('cancel', () => {
  it('stamps the cancellation and appends the reason to the notes', () => {
    const patch = machine.cancel(reservation({ notes: 'bring results' }), 'feeling better', NOW);
    expect(patch).toEqual({
      status: 'CANCELLED',
      cancelledAt: NOW,
      notes: 'bring results\nCancellation reason: feeling better',
    });
  });

  it('leaves the notes alone without a reason', () => {
    expect(machine.cancel(reservation(), undefined, NOW)).toEqual({
      status: 'CANCELLED',
      cancelledAt: NOW,
    });
  });
});
