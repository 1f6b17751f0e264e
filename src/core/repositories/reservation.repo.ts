import type {
  OverlapQuery,
  ProviderListFilters,
  Reservation,
  ReservationPatch,
  ReservationStatus,
} from '@core/interfaces/reservation.types.js';

/** Everything but the store-owned bookkeeping; the store starts `version` at 1. */
export type NewReservation = Omit<Reservation, 'version' | 'updatedAt'>;

export type VersionedPatch = ReservationPatch & { updatedAt: Date };

export interface ReservationReader {
  findById(id: string): Promise<Reservation | null>;
  /** Non-cancelled reservations matching the participant filters whose interval overlaps `[start, end)`. */
  findOverlapping(query: OverlapQuery): Promise<Reservation[]>;
}

export interface ReservationWriter extends ReservationReader {
  insert(data: NewReservation): Promise<Reservation>;
  /**
   * Compare-and-swap: applies `patch` and bumps `version` by one only while the stored
   * version equals `expectedVersion`. Resolves `null` when it does not.
   */
  updateIfVersion(
    id: string,
    expectedVersion: number,
    patch: VersionedPatch,
  ): Promise<Reservation | null>;
}

export interface ReservationRepository extends ReservationReader {
  listByRequester(requesterId: string, status?: ReservationStatus): Promise<Reservation[]>;
  listByProvider(providerId: string, filters?: ProviderListFilters): Promise<Reservation[]>;
  /**
   * Runs `fn` while holding every lock in `lockKeys`. Reads made through `tx` see all
   * writes committed by earlier holders of the same keys.
   */
  transaction<T>(lockKeys: string[], fn: (tx: ReservationWriter) => Promise<T>): Promise<T>;
  /** Resolves `false` when the store cannot be reached. */
  ping(): Promise<boolean>;
}

export function participantLockKeys(
  reservation: Pick<Reservation, 'providerId' | 'requesterId'>,
): string[] {
  return [`provider:${reservation.providerId}`, `requester:${reservation.requesterId}`];
}
