import {
  SchedulingConflictError,
  type ConflictSide,
} from '@core/errors/scheduling-conflict.error.js';
import type { Reservation } from '@core/interfaces/reservation.types.js';
import type { ReservationReader } from '@core/repositories/reservation.repo.js';

import { createLogger } from '@utils/logger.js';
import { intervalOf } from '@utils/time.js';

const log = createLogger('conflict');

export interface ConflictCheckInput {
  providerId: string;
  requesterId: string;
  start: Date;
  durationMinutes: number;
  /** The reservation being moved; it never conflicts with itself. */
  excludeId?: string;
}

export class ConflictDetector {
  /**
   * Throws `SchedulingConflictError` for the first occupied side, provider before requester.
   * Pass the transaction handle as `reader` to re-check under the write locks.
   */
  async assertFree(reader: ReservationReader, input: ConflictCheckInput): Promise<void> {
    const { start, end } = intervalOf(input.start, input.durationMinutes);

    const providerClashes = await reader.findOverlapping({
      providerId: input.providerId,
      start,
      end,
      excludeId: input.excludeId,
    });
    if (providerClashes.length > 0) {
      throw clash('provider', providerClashes);
    }

    const requesterClashes = await reader.findOverlapping({
      requesterId: input.requesterId,
      start,
      end,
      excludeId: input.excludeId,
    });
    if (requesterClashes.length > 0) {
      throw clash('requester', requesterClashes);
    }
  }
}

function clash(side: ConflictSide, rows: Reservation[]): SchedulingConflictError {
  const conflictingIds = rows.map((r) => r.id);
  log.info({ side, conflictingIds }, '[conflict] slot already taken');
  return new SchedulingConflictError(side, conflictingIds);
}
