import type {
  OverlapQuery,
  ProviderListFilters,
  Reservation,
  ReservationStatus,
} from '@core/interfaces/reservation.types.js';

import { KeyedMutex } from '@utils/locks.js';
import { intervalOf, overlaps } from '@utils/time.js';

import type {
  NewReservation,
  ReservationRepository,
  ReservationWriter,
  VersionedPatch,
} from './reservation.repo.js';

function clone(r: Reservation): Reservation {
  return structuredClone(r);
}

export class InMemoryReservationRepository implements ReservationRepository, ReservationWriter {
  private readonly rows = new Map<string, Reservation>();
  private readonly mutex = new KeyedMutex();

  async findById(id: string): Promise<Reservation | null> {
    const row = this.rows.get(id);
    return row ? clone(row) : null;
  }

  async findOverlapping(query: OverlapQuery): Promise<Reservation[]> {
    const candidate = { start: query.start, end: query.end };
    return [...this.rows.values()]
      .filter((r) => r.status !== 'CANCELLED')
      .filter((r) => query.providerId === undefined || r.providerId === query.providerId)
      .filter((r) => query.requesterId === undefined || r.requesterId === query.requesterId)
      .filter((r) => r.id !== query.excludeId)
      .filter((r) => overlaps(intervalOf(r.start, r.durationMinutes), candidate))
      .map(clone);
  }

  async listByRequester(requesterId: string, status?: ReservationStatus): Promise<Reservation[]> {
    return [...this.rows.values()]
      .filter((r) => r.requesterId === requesterId && (!status || r.status === status))
      .sort((a, b) => b.start.getTime() - a.start.getTime())
      .map(clone);
  }

  async listByProvider(providerId: string, filters: ProviderListFilters = {}): Promise<Reservation[]> {
    const { status, from, to } = filters;
    return [...this.rows.values()]
      .filter((r) => r.providerId === providerId)
      .filter((r) => !status || r.status === status)
      .filter((r) => !from || r.start.getTime() >= from.getTime())
      .filter((r) => !to || r.start.getTime() <= to.getTime())
      .sort((a, b) => a.start.getTime() - b.start.getTime())
      .map(clone);
  }

  async transaction<T>(lockKeys: string[], fn: (tx: ReservationWriter) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(lockKeys, () => fn(this));
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async insert(data: NewReservation): Promise<Reservation> {
    if (this.rows.has(data.id)) throw new Error(`Duplicate reservation id ${data.id}`);
    const row = clone({ ...data, version: 1, updatedAt: data.createdAt });
    this.rows.set(row.id, row);
    return clone(row);
  }

  async updateIfVersion(
    id: string,
    expectedVersion: number,
    patch: VersionedPatch,
  ): Promise<Reservation | null> {
    const current = this.rows.get(id);
    if (!current || current.version !== expectedVersion) return null;
    const next = clone({ ...current, ...patch, version: current.version + 1 });
    this.rows.set(id, next);
    return clone(next);
  }

  /** Test helper: number of stored rows, cancelled ones included. */
  size(): number {
    return this.rows.size;
  }
}
