import type { AppConfig } from '@config/env.config';
import type { BookingRules } from '@core/interfaces/reservation.types.js';

export const DEFAULT_BOOKING_RULES: Readonly<BookingRules> = Object.freeze({
  timezone: 'UTC',
  operatingHours: '09:00-17:00',
  minLeadMinutes: 120,
  maxReschedules: 2,
  rescheduleCutoffMinutes: 60,
  fees: { consultation: 2000, medication: 800 },
});

export function readBookingRules(
  cfg: Pick<
    AppConfig,
    | 'TIMEZONE'
    | 'OPENING_HOURS'
    | 'MIN_LEAD_MINUTES'
    | 'MAX_RESCHEDULES'
    | 'RESCHEDULE_CUTOFF_MINUTES'
    | 'CONSULTATION_FEE'
    | 'MEDICATION_FEE'
  >,
): BookingRules {
  return {
    timezone: cfg.TIMEZONE || DEFAULT_BOOKING_RULES.timezone,
    operatingHours: cfg.OPENING_HOURS || DEFAULT_BOOKING_RULES.operatingHours,
    minLeadMinutes: cfg.MIN_LEAD_MINUTES,
    // the stored reschedule_count is capped at 2, so a larger limit cannot be honoured
    maxReschedules: Math.min(cfg.MAX_RESCHEDULES, DEFAULT_BOOKING_RULES.maxReschedules),
    rescheduleCutoffMinutes: cfg.RESCHEDULE_CUTOFF_MINUTES,
    fees: { consultation: cfg.CONSULTATION_FEE, medication: cfg.MEDICATION_FEE },
  };
}
