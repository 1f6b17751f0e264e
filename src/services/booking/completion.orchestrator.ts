import type {
  BillingClient,
  MedicationItem,
  PrescriptionClient,
  RandomSource,
} from '@core/interfaces/collaborators.types.js';
import type { BookingRules, Reservation } from '@core/interfaces/reservation.types.js';

import { completedEvent } from '@services/notification/reservation.events.js';
import type { NotificationService } from '@services/notification/notification.service.js';

import { createLogger } from '@utils/logger.js';

import type { ConcurrencyGuard } from './concurrency.guard.js';
import { pickMedication } from './medication.catalog.js';
import type { ReservationStateMachine } from './reservation.state-machine.js';

const log = createLogger('completion');

export interface BillingOutcome {
  created: boolean;
  billId: string | null;
  totalAmount: number;
  consultationFee: number;
  medicationFee: number;
}

export interface PrescriptionOutcome extends MedicationItem {
  created: boolean;
  prescriptionId: string | null;
}

export interface CompletionOutcome {
  reservation: Reservation;
  billing: BillingOutcome;
  prescription: PrescriptionOutcome;
  notified: boolean;
}

export interface CompletionDeps {
  guard: ConcurrencyGuard;
  stateMachine: ReservationStateMachine;
  billing: BillingClient;
  prescriptions: PrescriptionClient;
  notifications: NotificationService;
  fees: BookingRules['fees'];
  random?: RandomSource;
}

/**
 * Marks a reservation COMPLETED, then bills, prescribes and notifies. The three
 * follow-ups are independent and best-effort: a failure is logged and reported with
 * fallback values, and never undoes the status change.
 */
export class CompletionOrchestrator {
  private readonly random: RandomSource;

  constructor(private readonly deps: CompletionDeps) {
    this.random = deps.random ?? Math.random;
  }

  async complete(current: Reservation, expectedVersion: number): Promise<CompletionOutcome> {
    // terminal states are rejected here, before any collaborator is called
    const patch = this.deps.stateMachine.complete(current);
    this.deps.guard.assertFresh(current, expectedVersion);
    const reservation = await this.deps.guard.write(current, expectedVersion, patch);
    log.info({ reservationId: reservation.id, version: reservation.version }, '[reservation] completed');

    const [billing, prescription] = await Promise.all([
      this.bill(reservation),
      this.prescribe(reservation, pickMedication(this.random)),
    ]);
    const notified = await this.deps.notifications.publish(completedEvent(reservation));

    return { reservation, billing, prescription, notified };
  }

  private async bill(r: Reservation): Promise<BillingOutcome> {
    const { consultation, medication } = this.deps.fees;
    const fallback: BillingOutcome = {
      created: false,
      billId: null,
      totalAmount: consultation + medication,
      consultationFee: consultation,
      medicationFee: medication,
    };
    try {
      const receipt = await this.deps.billing.createBill({
        requesterId: r.requesterId,
        reservationId: r.id,
        consultationFee: consultation,
        medicationFee: medication,
      });
      log.info({ reservationId: r.id, billId: receipt.billId }, '[completion] bill created');
      return { ...fallback, created: true, billId: receipt.billId, totalAmount: receipt.totalAmount };
    } catch (err) {
      log.warn({ err, reservationId: r.id }, '[completion] billing failed');
      return fallback;
    }
  }

  private async prescribe(r: Reservation, item: MedicationItem): Promise<PrescriptionOutcome> {
    try {
      const receipt = await this.deps.prescriptions.createPrescription({
        reservationId: r.id,
        requesterId: r.requesterId,
        providerId: r.providerId,
        ...item,
      });
      log.info(
        { reservationId: r.id, prescriptionId: receipt.prescriptionId, medication: item.medication },
        '[completion] prescription created',
      );
      return { ...item, created: true, prescriptionId: receipt.prescriptionId };
    } catch (err) {
      log.warn({ err, reservationId: r.id }, '[completion] prescription failed');
      return { ...item, created: false, prescriptionId: null };
    }
  }
}
