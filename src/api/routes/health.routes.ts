import { Router, type Request, type Response } from 'express';

import type { ReservationRepository } from '@core/repositories/reservation.repo.js';

const SERVICE = 'appointment-service';

export type DatabasePing = Pick<ReservationRepository, 'ping'>;

function stamp() {
  return { service: SERVICE, timestamp: new Date().toISOString() };
}

export function createHealthRouter(database: DatabasePing): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const healthy = await database.ping();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      ...stamp(),
      checks: {
        database: healthy
          ? { status: 'healthy', message: 'Database connection successful' }
          : { status: 'unhealthy', message: 'Database connection failed' },
      },
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const ready = await database.ping();
    res.status(ready ? 200 : 503).json({ status: ready ? 'ready' : 'not ready', ...stamp() });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive', ...stamp() });
  });

  return router;
}
