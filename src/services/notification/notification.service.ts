import type { Notifier, ReservationEvent } from '@core/interfaces/collaborators.types.js';

import { createLogger } from '@utils/logger.js';

const log = createLogger('notification');

/** Best-effort publishing: delivery failures are logged and reported as `false`. */
export class NotificationService {
  constructor(private readonly notifier: Notifier) {}

  async publish(event: ReservationEvent): Promise<boolean> {
    try {
      const delivered = await this.notifier.emit(event);
      if (!delivered) {
        log.warn({ type: event.type, reservationId: event.reservationId }, '[notify] not delivered');
      }
      return delivered;
    } catch (err) {
      log.warn(
        { err, type: event.type, reservationId: event.reservationId },
        '[notify] emit failed',
      );
      return false;
    }
  }
}
