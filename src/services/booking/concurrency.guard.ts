import { NotFoundError } from '@core/errors/not-found.error.js';
import { VersionConflictError } from '@core/errors/version-conflict.error.js';
import type { Clock } from '@core/interfaces/collaborators.types.js';
import type { Reservation, ReservationPatch } from '@core/interfaces/reservation.types.js';
import {
  participantLockKeys,
  type NewReservation,
  type ReservationRepository,
  type ReservationWriter,
} from '@core/repositories/reservation.repo.js';

/** Extra check run inside the write scope, after the version check and before the write. */
export type WriteCheck = (tx: ReservationWriter) => Promise<void>;

export class ConcurrencyGuard {
  constructor(
    private readonly repository: ReservationRepository,
    private readonly now: Clock = () => new Date(),
  ) {}

  /** Fails fast when the caller's copy is already stale. */
  assertFresh(current: Reservation, expectedVersion: number): void {
    if (current.version !== expectedVersion) {
      throw new VersionConflictError(current.id, expectedVersion, current.version);
    }
  }

  async create(data: NewReservation, check?: WriteCheck): Promise<Reservation> {
    return this.repository.transaction(participantLockKeys(data), async (tx) => {
      if (check) await check(tx);
      return tx.insert(data);
    });
  }

  async write(
    current: Reservation,
    expectedVersion: number,
    patch: ReservationPatch,
    check?: WriteCheck,
  ): Promise<Reservation> {
    return this.repository.transaction(participantLockKeys(current), async (tx) => {
      const latest = await tx.findById(current.id);
      if (!latest) throw new NotFoundError('Reservation not found');
      if (latest.version !== expectedVersion) {
        throw new VersionConflictError(current.id, expectedVersion, latest.version);
      }
      if (check) await check(tx);

      const updated = await tx.updateIfVersion(current.id, expectedVersion, {
        ...patch,
        updatedAt: this.now(),
      });
      if (!updated) throw new VersionConflictError(current.id, expectedVersion);
      return updated;
    });
  }
}
