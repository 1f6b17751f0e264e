import { Router, type RequestHandler } from 'express';

import type { ReservationService } from '@services/booking/reservation.service.js';

import { createAppointmentRouter } from './appointment.routes.js';

export interface ApiRouterDeps {
  service: ReservationService;
  auth: RequestHandler;
  timezone: string;
}

export function createApiRouter({ service, auth, timezone }: ApiRouterDeps): Router {
  const v1Router = Router();
  v1Router.use('/appointments', auth, createAppointmentRouter(service, timezone));

  const router = Router();
  router.use('/api/v1', v1Router);
  return router;
}
