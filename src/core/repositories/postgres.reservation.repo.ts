import type { Pool, PoolClient } from 'pg';

import { SchedulingConflictError } from '@core/errors/scheduling-conflict.error.js';
import {
  isReservationStatus,
  type OverlapQuery,
  type ProviderListFilters,
  type Reservation,
  type ReservationStatus,
} from '@core/interfaces/reservation.types.js';

import { lockOrder, pgAdvisoryXactLock } from '@utils/locks.js';
import { createLogger } from '@utils/logger.js';
import { intervalOf } from '@utils/time.js';

import type {
  NewReservation,
  ReservationRepository,
  ReservationWriter,
  VersionedPatch,
} from './reservation.repo.js';

const log = createLogger('postgres-reservation-repository');

const EXCLUSION_VIOLATION = '23P01';

export interface ReservationRow {
  id: string;
  requester_id: string;
  provider_id: string;
  category_id: string;
  start_at: Date;
  end_at: Date;
  duration_minutes: number;
  status: string;
  reschedule_count: number;
  version: number;
  reason: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
  cancelled_at: Date | null;
}

export function rowToReservation(row: ReservationRow): Reservation {
  if (!isReservationStatus(row.status)) {
    throw new Error(`Unknown reservation status '${row.status}' on ${row.id}`);
  }
  return {
    id: row.id,
    requesterId: row.requester_id,
    providerId: row.provider_id,
    categoryId: row.category_id,
    start: new Date(row.start_at),
    durationMinutes: row.duration_minutes,
    status: row.status,
    rescheduleCount: row.reschedule_count,
    version: row.version,
    reason: row.reason,
    notes: row.notes,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    cancelledAt: row.cancelled_at ? new Date(row.cancelled_at) : null,
  };
}

function isExclusionViolation(err: unknown): err is { code: string; constraint?: string } {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === EXCLUSION_VIOLATION;
}

/** Reads and writes bound to one client, so they can share a transaction. */
class PgReservationStatements implements ReservationWriter {
  constructor(private readonly client: PoolClient) {}

  async findById(id: string): Promise<Reservation | null> {
    const res = await this.client.query<ReservationRow>(
      'SELECT * FROM reservations WHERE id = $1',
      [id],
    );
    const row = res.rows[0];
    return row ? rowToReservation(row) : null;
  }

  async findOverlapping(query: OverlapQuery): Promise<Reservation[]> {
    const res = await this.client.query<ReservationRow>(
      `SELECT * FROM reservations
       WHERE status <> 'CANCELLED'
         AND ($1::text IS NULL OR provider_id = $1)
         AND ($2::text IS NULL OR requester_id = $2)
         AND ($3::text IS NULL OR id <> $3)
         AND start_at < $5
         AND end_at > $4
       ORDER BY start_at ASC`,
      [
        query.providerId ?? null,
        query.requesterId ?? null,
        query.excludeId ?? null,
        query.start,
        query.end,
      ],
    );
    return res.rows.map(rowToReservation);
  }

  async insert(data: NewReservation): Promise<Reservation> {
    const { end } = intervalOf(data.start, data.durationMinutes);
    try {
      const res = await this.client.query<ReservationRow>(
        `INSERT INTO reservations
          (id, requester_id, provider_id, category_id, start_at, end_at, duration_minutes,
           status, reschedule_count, version, reason, notes, created_at, updated_at, cancelled_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 1, $10, $11, $12, $12, $13)
         RETURNING *`,
        [
          data.id,
          data.requesterId,
          data.providerId,
          data.categoryId,
          data.start,
          end,
          data.durationMinutes,
          data.status,
          data.rescheduleCount,
          data.reason,
          data.notes,
          data.createdAt,
          data.cancelledAt,
        ],
      );
      return rowToReservation(res.rows[0]);
    } catch (err) {
      throw mapConstraintError(err);
    }
  }

  async updateIfVersion(
    id: string,
    expectedVersion: number,
    patch: VersionedPatch,
  ): Promise<Reservation | null> {
    const sets: string[] = [];
    const values: unknown[] = [id, expectedVersion];
    const set = (column: string, value: unknown): string => {
      values.push(value);
      const placeholder = `$${values.length}`;
      sets.push(`${column} = ${placeholder}`);
      return placeholder;
    };

    // SET expressions see the old row, so end_at is derived from the new values
    let startRef = 'start_at';
    let durationRef = 'duration_minutes';
    if (patch.start !== undefined) startRef = set('start_at', patch.start);
    if (patch.durationMinutes !== undefined) {
      durationRef = set('duration_minutes', patch.durationMinutes);
    }
    if (patch.start !== undefined || patch.durationMinutes !== undefined) {
      sets.push(`end_at = ${startRef}::timestamptz + make_interval(mins => ${durationRef}::int)`);
    }
    if (patch.status !== undefined) set('status', patch.status);
    if (patch.rescheduleCount !== undefined) set('reschedule_count', patch.rescheduleCount);
    if (patch.reason !== undefined) set('reason', patch.reason);
    if (patch.notes !== undefined) set('notes', patch.notes);
    if (patch.cancelledAt !== undefined) set('cancelled_at', patch.cancelledAt);
    set('updated_at', patch.updatedAt);
    sets.push('version = version + 1');

    try {
      const res = await this.client.query<ReservationRow>(
        `UPDATE reservations SET ${sets.join(', ')}
         WHERE id = $1 AND version = $2
         RETURNING *`,
        values,
      );
      const row = res.rows[0];
      return res.rowCount === 1 && row ? rowToReservation(row) : null;
    } catch (err) {
      throw mapConstraintError(err);
    }
  }
}

function mapConstraintError(err: unknown): unknown {
  if (!isExclusionViolation(err)) return err;
  const side = err.constraint?.includes('requester') ? 'requester' : 'provider';
  log.warn({ constraint: err.constraint }, '[reservation] exclusion constraint rejected write');
  return new SchedulingConflictError(side);
}

export class PostgresReservationRepository implements ReservationRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<Reservation | null> {
    return this.withClient((s) => s.findById(id));
  }

  async findOverlapping(query: OverlapQuery): Promise<Reservation[]> {
    return this.withClient((s) => s.findOverlapping(query));
  }

  async listByRequester(requesterId: string, status?: ReservationStatus): Promise<Reservation[]> {
    const client = await this.pool.connect();
    try {
      const res = await client.query<ReservationRow>(
        `SELECT * FROM reservations
         WHERE requester_id = $1 AND ($2::text IS NULL OR status = $2)
         ORDER BY start_at DESC`,
        [requesterId, status ?? null],
      );
      return res.rows.map(rowToReservation);
    } finally {
      client.release();
    }
  }

  async listByProvider(providerId: string, filters: ProviderListFilters = {}): Promise<Reservation[]> {
    const client = await this.pool.connect();
    try {
      const res = await client.query<ReservationRow>(
        `SELECT * FROM reservations
         WHERE provider_id = $1
           AND ($2::text IS NULL OR status = $2)
           AND ($3::timestamptz IS NULL OR start_at >= $3)
           AND ($4::timestamptz IS NULL OR start_at <= $4)
         ORDER BY start_at ASC`,
        [providerId, filters.status ?? null, filters.from ?? null, filters.to ?? null],
      );
      return res.rows.map(rowToReservation);
    } finally {
      client.release();
    }
  }

  async transaction<T>(lockKeys: string[], fn: (tx: ReservationWriter) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const key of lockOrder(lockKeys)) {
        await pgAdvisoryXactLock(client, key);
      }
      const result = await fn(new PgReservationStatements(client));
      await client.query('COMMIT');
      return result;
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      log.warn({ err }, '[reservation] database ping failed');
      return false;
    }
  }

  private async withClient<T>(fn: (s: PgReservationStatements) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(new PgReservationStatements(client));
    } finally {
      client.release();
    }
  }
}
