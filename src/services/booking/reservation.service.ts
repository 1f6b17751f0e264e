import { randomUUID } from 'crypto';

import { NotFoundError } from '@core/errors/not-found.error.js';
import type {
  BillingClient,
  Clock,
  DirectoryClient,
  Notifier,
  PrescriptionClient,
  RandomSource,
} from '@core/interfaces/collaborators.types.js';
import type {
  BookingRules,
  BookReservationDTO,
  CancelReservationDTO,
  ProviderListFilters,
  Reservation,
  ReservationPatch,
  ReservationStatus,
  RescheduleReservationDTO,
} from '@core/interfaces/reservation.types.js';
import type { ReservationRepository } from '@core/repositories/reservation.repo.js';

import { NotificationService } from '@services/notification/notification.service.js';
import {
  cancelledEvent,
  rescheduledEvent,
  scheduledEvent,
} from '@services/notification/reservation.events.js';

import { createLogger } from '@utils/logger.js';

import { CompletionOrchestrator, type CompletionOutcome } from './completion.orchestrator.js';
import { ConcurrencyGuard } from './concurrency.guard.js';
import { DEFAULT_BOOKING_RULES } from './config.defaults.js';
import { ConflictDetector } from './conflict.detector.js';
import { ReservationStateMachine } from './reservation.state-machine.js';
import { ValidationService } from './validation.service.js';

const log = createLogger('reservation');

export interface ReservationServiceDeps {
  repository: ReservationRepository;
  directory: DirectoryClient;
  notifier: Notifier;
  billing: BillingClient;
  prescriptions: PrescriptionClient;
  rules?: BookingRules;
  now?: Clock;
  random?: RandomSource;
  newId?: () => string;
}

export class ReservationService {
  private readonly repository: ReservationRepository;
  private readonly now: Clock;
  private readonly newId: () => string;
  private readonly validation: ValidationService;
  private readonly conflicts = new ConflictDetector();
  private readonly stateMachine: ReservationStateMachine;
  private readonly guard: ConcurrencyGuard;
  private readonly notifications: NotificationService;
  private readonly completion: CompletionOrchestrator;

  constructor(deps: ReservationServiceDeps) {
    const rules = deps.rules ?? DEFAULT_BOOKING_RULES;
    this.repository = deps.repository;
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
    this.validation = new ValidationService(deps.directory, rules, this.now);
    this.stateMachine = new ReservationStateMachine(rules);
    this.guard = new ConcurrencyGuard(deps.repository, this.now);
    this.notifications = new NotificationService(deps.notifier);
    this.completion = new CompletionOrchestrator({
      guard: this.guard,
      stateMachine: this.stateMachine,
      billing: deps.billing,
      prescriptions: deps.prescriptions,
      notifications: this.notifications,
      fees: rules.fees,
      random: deps.random,
    });
  }

  async book(dto: BookReservationDTO): Promise<Reservation> {
    await this.validation.validateSlot(dto);

    const slot = {
      providerId: dto.providerId,
      requesterId: dto.requesterId,
      start: dto.start,
      durationMinutes: dto.durationMinutes,
    };
    await this.conflicts.assertFree(this.repository, slot);

    const now = this.now();
    const created = await this.guard.create(
      {
        id: this.newId(),
        requesterId: dto.requesterId,
        providerId: dto.providerId,
        categoryId: dto.categoryId,
        start: dto.start,
        durationMinutes: dto.durationMinutes,
        status: 'SCHEDULED',
        rescheduleCount: 0,
        reason: dto.reason ?? null,
        notes: dto.notes ?? null,
        createdAt: now,
        cancelledAt: null,
      },
      // the same check again, now under the provider/requester locks
      (tx) => this.conflicts.assertFree(tx, slot),
    );

    log.info(
      { reservationId: created.id, providerId: created.providerId, requesterId: created.requesterId },
      '[reservation] booked',
    );
    await this.notifications.publish(scheduledEvent(created));
    return created;
  }

  async get(id: string): Promise<Reservation> {
    const reservation = await this.repository.findById(id);
    if (!reservation) throw new NotFoundError('Reservation not found');
    return reservation;
  }

  async reschedule(dto: RescheduleReservationDTO): Promise<Reservation> {
    const current = await this.get(dto.id);
    this.guard.assertFresh(current, dto.expectedVersion);

    const patch = this.stateMachine.reschedule(current, dto, this.now());
    const durationMinutes = patch.durationMinutes ?? current.durationMinutes;

    await this.validation.validateSlot({
      requesterId: current.requesterId,
      providerId: current.providerId,
      categoryId: current.categoryId,
      start: dto.start,
      durationMinutes,
    });

    const slot = {
      providerId: current.providerId,
      requesterId: current.requesterId,
      start: dto.start,
      durationMinutes,
      excludeId: current.id,
    };
    await this.conflicts.assertFree(this.repository, slot);

    const updated = await this.guard.write(current, dto.expectedVersion, patch, (tx) =>
      this.conflicts.assertFree(tx, slot),
    );

    log.info(
      { reservationId: updated.id, version: updated.version, rescheduleCount: updated.rescheduleCount },
      '[reservation] rescheduled',
    );
    await this.notifications.publish(rescheduledEvent(current, updated));
    return updated;
  }

  async cancel(dto: CancelReservationDTO): Promise<Reservation> {
    const updated = await this.transition(dto.id, dto.expectedVersion, (current) =>
      this.stateMachine.cancel(current, dto.reason, this.now()),
    );
    log.info({ reservationId: updated.id, version: updated.version }, '[reservation] cancelled');
    await this.notifications.publish(cancelledEvent(updated));
    return updated;
  }

  async confirm(id: string, expectedVersion: number): Promise<Reservation> {
    const updated = await this.transition(id, expectedVersion, (current) =>
      this.stateMachine.confirm(current),
    );
    log.info({ reservationId: updated.id, version: updated.version }, '[reservation] confirmed');
    return updated;
  }

  async complete(id: string, expectedVersion: number): Promise<CompletionOutcome> {
    const current = await this.get(id);
    return this.completion.complete(current, expectedVersion);
  }

  /** Administrative marking; nothing in the service moves a reservation to NO_SHOW on its own. */
  async markNoShow(id: string, expectedVersion: number): Promise<Reservation> {
    const updated = await this.transition(id, expectedVersion, (current) =>
      this.stateMachine.markNoShow(current),
    );
    log.info({ reservationId: updated.id, version: updated.version }, '[reservation] no-show');
    return updated;
  }

  async listByRequester(requesterId: string, status?: ReservationStatus): Promise<Reservation[]> {
    return this.repository.listByRequester(requesterId, status);
  }

  async listByProvider(providerId: string, filters: ProviderListFilters = {}): Promise<Reservation[]> {
    return this.repository.listByProvider(providerId, filters);
  }

  private async transition(
    id: string,
    expectedVersion: number,
    plan: (current: Reservation) => ReservationPatch,
  ): Promise<Reservation> {
    const current = await this.get(id);
    this.guard.assertFresh(current, expectedVersion);
    return this.guard.write(current, expectedVersion, plan(current));
  }
}
