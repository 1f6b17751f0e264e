export type DirectoryKind = 'requester' | 'provider';

export interface DirectoryEntry {
  exists: boolean;
  active: boolean;
  categoryId: string | null;
  /** Set when the directory was unreachable and the lookup was let through unverified. */
  assumed?: boolean;
}

export interface DirectoryClient {
  lookup(kind: DirectoryKind, id: string): Promise<DirectoryEntry>;
}

export interface BillReceipt {
  billId: string;
  totalAmount: number;
}

export interface BillingClient {
  createBill(input: {
    requesterId: string;
    reservationId: string;
    consultationFee: number;
    medicationFee: number;
  }): Promise<BillReceipt>;
}

export interface MedicationItem {
  medication: string;
  dosage: string;
  days: number;
}

export interface PrescriptionRequest extends MedicationItem {
  reservationId: string;
  requesterId: string;
  providerId: string;
}

export interface PrescriptionReceipt {
  prescriptionId: string;
}

export interface PrescriptionClient {
  createPrescription(input: PrescriptionRequest): Promise<PrescriptionReceipt>;
}

export type ReservationEventType = 'scheduled' | 'rescheduled' | 'cancelled' | 'completed';

export interface SlotBoundaries {
  start: string;
  end: string;
}

export interface ReservationEvent {
  type: ReservationEventType;
  reservationId: string;
  requesterId: string;
  providerId: string;
  categoryId: string;
  status: string;
  version: number;
  slot: SlotBoundaries;
  oldSlot?: SlotBoundaries;
  rescheduleCount?: number;
  cancelledAt?: string;
}

export interface Notifier {
  /** Resolves `false` when the event could not be delivered; never rejects. */
  emit(event: ReservationEvent): Promise<boolean>;
}

export type Clock = () => Date;
export type RandomSource = () => number;
