import express, { type Express, type RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import type { ReservationService } from '@services/booking/reservation.service.js';

import { createApiRouter, createHealthRouter, type DatabasePing } from '@api/index.js';
import { errorMiddleware } from '@middleware/index.js';

export interface AppDeps {
  service: ReservationService;
  auth: RequestHandler;
  timezone: string;
  database: DatabasePing;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  app.use('/', createHealthRouter(deps.database));
  app.use('/', createApiRouter(deps));
  app.use(errorMiddleware);

  return app;
}
