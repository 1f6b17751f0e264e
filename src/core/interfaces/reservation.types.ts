export const RESERVATION_STATUSES = [
  'SCHEDULED',
  'CONFIRMED',
  'COMPLETED',
  'CANCELLED',
  'NO_SHOW',
] as const;

export type ReservationStatus = (typeof RESERVATION_STATUSES)[number];

export function isReservationStatus(value: unknown): value is ReservationStatus {
  return typeof value === 'string' && (RESERVATION_STATUSES as readonly string[]).includes(value);
}

export interface Reservation {
  id: string;
  requesterId: string;
  providerId: string;
  categoryId: string;
  start: Date;
  durationMinutes: number;
  status: ReservationStatus;
  rescheduleCount: number;
  version: number;
  reason: string | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
  cancelledAt: Date | null;
}

/** Fields a mutation may change; `version` and `updatedAt` are owned by the store. */
export type ReservationPatch = Partial<
  Pick<
    Reservation,
    'start' | 'durationMinutes' | 'status' | 'rescheduleCount' | 'reason' | 'notes' | 'cancelledAt'
  >
>;

export interface BookReservationDTO {
  requesterId: string;
  providerId: string;
  categoryId: string;
  start: Date;
  durationMinutes: number;
  reason?: string | null;
  notes?: string | null;
}

export interface RescheduleReservationDTO {
  id: string;
  expectedVersion: number;
  start: Date;
  durationMinutes?: number;
  reason?: string | null;
  notes?: string | null;
}

export interface CancelReservationDTO {
  id: string;
  expectedVersion: number;
  reason?: string | null;
}

export interface OverlapQuery {
  providerId?: string;
  requesterId?: string;
  start: Date;
  end: Date;
  excludeId?: string;
}

export interface ProviderListFilters {
  status?: ReservationStatus;
  /** Inclusive lower bound on `start`. */
  from?: Date;
  /** Inclusive upper bound on `start`. */
  to?: Date;
}

export interface BookingRules {
  timezone: string;
  /** "HH:mm-HH:mm" */
  operatingHours: string;
  minLeadMinutes: number;
  maxReschedules: number;
  rescheduleCutoffMinutes: number;
  fees: {
    consultation: number;
    medication: number;
  };
}
