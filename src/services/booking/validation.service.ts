import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';
import type {
  Clock,
  DirectoryClient,
  DirectoryKind,
} from '@core/interfaces/collaborators.types.js';
import type { BookingRules } from '@core/interfaces/reservation.types.js';

import { intervalOf, minutesBetween } from '@utils/time.js';

import { isWithinOperatingWindow } from './opening-hours.util.js';

export interface SlotRequest {
  requesterId: string;
  providerId: string;
  categoryId: string;
  start: Date;
  durationMinutes: number;
}

const LABEL: Record<DirectoryKind, string> = { requester: 'Requester', provider: 'Provider' };

/**
 * Rule chain run before any booking or reschedule write. Checks run in a fixed order
 * (identity, operating hours, lead time) and the first failure is thrown.
 */
export class ValidationService {
  constructor(
    private readonly directory: DirectoryClient,
    private readonly rules: BookingRules,
    private readonly now: Clock = () => new Date(),
  ) {}

  async validateSlot(req: SlotRequest): Promise<void> {
    this.assertWellFormed(req);
    await this.validateIdentity(req);
    this.validateOperatingHours(req.start, req.durationMinutes);
    this.validateLeadTime(req.start);
  }

  assertWellFormed(req: Pick<SlotRequest, 'start' | 'durationMinutes'>): void {
    if (!(req.start instanceof Date) || Number.isNaN(req.start.getTime())) {
      throw new ValidationError('Start time is not a valid date');
    }
    if (!Number.isInteger(req.durationMinutes) || req.durationMinutes <= 0) {
      throw new ValidationError('Duration must be a positive whole number of minutes');
    }
  }

  async validateIdentity(req: Pick<SlotRequest, 'requesterId' | 'providerId' | 'categoryId'>) {
    await this.assertActive('requester', req.requesterId);
    const provider = await this.assertActive('provider', req.providerId);
    if (!provider.assumed && provider.categoryId !== req.categoryId) {
      throw new ValidationError('Provider does not belong to the requested category', {
        rule: 'category',
      });
    }
  }

  validateOperatingHours(start: Date, durationMinutes: number): void {
    const slot = intervalOf(start, durationMinutes);
    if (!isWithinOperatingWindow(slot, this.rules.operatingHours, this.rules.timezone)) {
      throw new ValidationError(
        `Reservation must fall within operating hours (${this.rules.operatingHours} ${this.rules.timezone})`,
        { rule: 'operating_hours' },
      );
    }
  }

  validateLeadTime(start: Date): void {
    if (minutesBetween(this.now(), start) < this.rules.minLeadMinutes) {
      throw new ValidationError(
        `Reservation must start at least ${this.rules.minLeadMinutes} minutes from now`,
        { rule: 'lead_time' },
      );
    }
  }

  private async assertActive(kind: DirectoryKind, id: string) {
    const entry = await this.directory.lookup(kind, id);
    if (!entry.exists) throw new NotFoundError(`${LABEL[kind]} not found`);
    if (!entry.active) {
      throw new ValidationError(`${LABEL[kind]} is not active`, { rule: 'identity' });
    }
    return entry;
  }
}
