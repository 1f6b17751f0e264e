import { BaseError } from './base-error.js';

export class InvalidTransitionError extends BaseError {
  constructor(from: string, action: string) {
    super('INVALID_TRANSITION', 409, `Cannot ${action} a reservation with status ${from}`, {
      from,
      action,
    });
  }
}
