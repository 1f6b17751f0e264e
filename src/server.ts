import type { Server } from 'http';

import type { Pool } from 'pg';

import { config } from '@config/env.config';

import { InMemoryReservationRepository } from '@core/repositories/in-memory.reservation.repo.js';
import { PostgresReservationRepository } from '@core/repositories/postgres.reservation.repo.js';
import type { ReservationRepository } from '@core/repositories/reservation.repo.js';

import { HttpBillingClient } from '@infra/billing/billing.client.js';
import { closePool, createPool } from '@infra/database/pg.pool.js';
import { HttpDirectoryClient } from '@infra/directory/directory.client.js';
import { createHttpClient } from '@infra/http/http.client.js';
import { HttpNotifier } from '@infra/notification/notification.client.js';
import { HttpPrescriptionClient } from '@infra/prescription/prescription.client.js';

import { createAuthMiddleware } from '@middleware/index.js';

import { readBookingRules } from '@services/booking/config.defaults.js';
import { ReservationService } from '@services/booking/reservation.service.js';

import { logger } from '@utils/logger.js';
import { drainAndClose } from '@utils/shutdown.js';

import { createApp } from './app.js';

function buildRepository(pool: Pool | null): ReservationRepository {
  if (pool) return new PostgresReservationRepository(pool);
  logger.warn('DATABASE_URL not set, reservations are kept in memory');
  return new InMemoryReservationRepository();
}

function registerShutdownSignals(server: Server, pool: Pool | null): void {
  const handler = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    try {
      await drainAndClose(server, pool ? [() => closePool(pool)] : []);
    } catch (err) {
      logger.error({ err }, 'shutdown failed');
      process.exitCode = 1;
    } finally {
      process.exit();
    }
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

async function bootstrap() {
  const pool = config.DATABASE_URL ? createPool(config.DATABASE_URL, config.DB_POOL_MAX) : null;
  const http = createHttpClient(config.EXTERNAL_TIMEOUT_MS);
  const rules = readBookingRules(config);

  const repository = buildRepository(pool);
  const service = new ReservationService({
    repository,
    directory: new HttpDirectoryClient(http, {
      requesterUrl: config.REQUESTER_SERVICE_URL,
      providerUrl: config.PROVIDER_SERVICE_URL,
      failOpen: config.DIRECTORY_FAIL_OPEN,
    }),
    billing: new HttpBillingClient(http, config.BILLING_SERVICE_URL),
    prescriptions: new HttpPrescriptionClient(http, config.PRESCRIPTION_SERVICE_URL),
    notifier: new HttpNotifier(http, config.NOTIFICATION_SERVICE_URL),
    rules,
  });

  const app = createApp({
    service,
    auth: createAuthMiddleware({ secret: config.JWT_SECRET, algorithm: config.JWT_ALGORITHM }),
    timezone: rules.timezone,
    database: repository,
  });

  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, timezone: rules.timezone }, 'appointment service up');
  });
  registerShutdownSignals(server, pool);
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Fatal bootstrap error');
  process.exit(1);
});
