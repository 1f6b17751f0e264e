import { BaseError } from './base-error.js';

export type ReschedulePolicyRule = 'max_reschedules' | 'cutoff';

export class ReschedulePolicyError extends BaseError {
  constructor(
    public readonly rule: ReschedulePolicyRule,
    message: string,
  ) {
    super('RESCHEDULE_POLICY', 422, message, { rule });
  }
}
