import { describe, it, expect, beforeEach } from 'vitest';

import { SchedulingConflictError } from '@core/errors/scheduling-conflict.error.js';
import type { ReservationStatus } from '@core/interfaces/reservation.types.js';
import { InMemoryReservationRepository } from '@core/repositories/in-memory.reservation.repo.js';

import { ConflictDetector } from '@services/booking/conflict.detector.js';

import { NOW, at } from '@test/utils/fakes.js';

const detector = new ConflictDetector();
let repo: InMemoryReservationRepository;

async function seed(id: string, start: string, status: ReservationStatus = 'SCHEDULED') {
  await repo.insert({
    id,
    requesterId: 'req-1',
    providerId: 'prov-1',
    categoryId: 'cardiology',
    start: at(start),
    durationMinutes: 30,
    status,
    rescheduleCount: 0,
    reason: null,
    notes: null,
    createdAt: NOW,
    cancelledAt: status === 'CANCELLED' ? NOW : null,
  });
}

const slot = (start: string, overrides: { providerId?: string; requesterId?: string } = {}) => ({
  providerId: 'prov-1',
  requesterId: 'req-2',
  start: at(start),
  durationMinutes: 30,
  ...overrides,
});

beforeEach(() => {
  repo = new InMemoryReservationRepository();
});

describe('ConflictDetector', () => {
  it('lets back-to-back slots through', async () => {
    await seed('a', '10:00');
    await expect(detector.assertFree(repo, slot('10:30'))).resolves.toBeUndefined();
    await expect(detector.assertFree(repo, slot('09:30'))).resolves.toBeUndefined();
  });

  it('reports the provider side with the clashing ids', async () => {
    await seed('a', '09:45');
    const err = await detector.assertFree(repo, slot('10:00')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SchedulingConflictError);
    expect(err).toMatchObject({ side: 'provider', conflictingIds: ['a'], data: { side: 'provider' } });
  });

  it('reports the requester side when only the requester is busy', async () => {
    await seed('a', '10:00');
    await expect(
      detector.assertFree(repo, slot('10:15', { providerId: 'prov-2', requesterId: 'req-1' })),
    ).rejects.toMatchObject({ side: 'requester' });
  });

  it('ignores cancelled reservations', async () => {
    await seed('a', '10:00', 'CANCELLED');
    await expect(detector.assertFree(repo, slot('10:00'))).resolves.toBeUndefined();
  });

  it('still counts completed and no-show reservations', async () => {
    await seed('a', '10:00', 'COMPLETED');
    await seed('b', '11:00', 'NO_SHOW');
    await expect(detector.assertFree(repo, slot('10:00'))).rejects.toBeInstanceOf(
      SchedulingConflictError,
    );
    await expect(detector.assertFree(repo, slot('11:00'))).rejects.toBeInstanceOf(
      SchedulingConflictError,
    );
  });

  it('never conflicts a reservation with itself', async () => {
    await seed('a', '10:00');
    await expect(
      detector.assertFree(repo, { ...slot('10:15', { requesterId: 'req-1' }), excludeId: 'a' }),
    ).resolves.toBeUndefined();
  });
});
