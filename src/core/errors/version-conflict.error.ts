import { BaseError } from './base-error.js';

export class VersionConflictError extends BaseError {
  constructor(id: string, expected: number, actual?: number) {
    super('VERSION_CONFLICT', 409, 'Reservation was modified concurrently, reload and retry', {
      id,
      expected,
      ...(actual !== undefined ? { actual } : {}),
    });
  }
}
