import { BaseError } from './base-error.js';

export type ConflictSide = 'provider' | 'requester';

export class SchedulingConflictError extends BaseError {
  constructor(
    public readonly side: ConflictSide,
    /** Ids of the clashing reservations; logged, never sent to callers. */
    public readonly conflictingIds: string[] = [],
    message = side === 'provider'
      ? 'Provider is not available at this time slot'
      : 'Requester already has a reservation at this time slot',
  ) {
    super('SCHEDULING_CONFLICT', 409, message, { side });
  }
}
