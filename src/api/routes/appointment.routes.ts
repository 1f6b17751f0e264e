import { Router, type NextFunction, type Request, type Response } from 'express';

import type { ReservationService } from '@services/booking/reservation.service.js';

import { toAppointmentJson, toCompletionJson } from '../controllers/appointment.serializer.js';
import { appointmentSchemas } from '../controllers/appointment.validator.js';

type Handler = (req: Request, res: Response) => Promise<void>;

function route(handler: Handler) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res);
    } catch (err) {
      next(err);
    }
  };
}

export function createAppointmentRouter(service: ReservationService, timezone: string): Router {
  const router = Router();
  const schemas = appointmentSchemas(timezone);

  router.post(
    '/',
    route(async (req, res) => {
      const body = schemas.book.parse(req.body);
      const reservation = await service.book({
        requesterId: body.requester_id,
        providerId: body.provider_id,
        categoryId: body.category_id,
        start: body.start,
        durationMinutes: body.duration_minutes,
        reason: body.reason,
        notes: body.notes,
      });
      res.status(201).json({
        message: 'Appointment booked successfully',
        appointment: toAppointmentJson(reservation),
      });
    }),
  );

  router.get(
    '/requester/:requesterId',
    route(async (req, res) => {
      const query = schemas.requesterQuery.parse(req.query);
      const list = await service.listByRequester(req.params.requesterId, query.status);
      res.json(list.map(toAppointmentJson));
    }),
  );

  router.get(
    '/provider/:providerId',
    route(async (req, res) => {
      const query = schemas.providerQuery.parse(req.query);
      const list = await service.listByProvider(req.params.providerId, {
        status: query.status,
        from: query.start_date,
        to: query.end_date,
      });
      res.json(list.map(toAppointmentJson));
    }),
  );

  router.get(
    '/:id',
    route(async (req, res) => {
      const reservation = await service.get(req.params.id);
      res.json(toAppointmentJson(reservation));
    }),
  );

  router.post(
    '/:id/reschedule',
    route(async (req, res) => {
      const body = schemas.reschedule.parse(req.body);
      const reservation = await service.reschedule({
        id: req.params.id,
        expectedVersion: body.expected_version,
        start: body.start,
        durationMinutes: body.duration_minutes,
        reason: body.reason,
        notes: body.notes,
      });
      res.json({
        message: 'Appointment rescheduled successfully',
        appointment: toAppointmentJson(reservation),
      });
    }),
  );

  router.post(
    '/:id/cancel',
    route(async (req, res) => {
      const body = schemas.cancel.parse(req.body ?? {});
      const reservation = await service.cancel({
        id: req.params.id,
        expectedVersion: body.expected_version,
        reason: body.reason,
      });
      res.json({
        message: 'Appointment cancelled successfully',
        appointment: toAppointmentJson(reservation),
      });
    }),
  );

  router.post(
    '/:id/confirm',
    route(async (req, res) => {
      const body = schemas.versioned.parse(req.body ?? {});
      const reservation = await service.confirm(req.params.id, body.expected_version);
      res.json({ message: 'Appointment confirmed', appointment: toAppointmentJson(reservation) });
    }),
  );

  router.post(
    '/:id/complete',
    route(async (req, res) => {
      const body = schemas.versioned.parse(req.body ?? {});
      const outcome = await service.complete(req.params.id, body.expected_version);
      res.json(toCompletionJson(outcome));
    }),
  );

  router.post(
    '/:id/no-show',
    route(async (req, res) => {
      const body = schemas.versioned.parse(req.body ?? {});
      const reservation = await service.markNoShow(req.params.id, body.expected_version);
      res.json({
        message: 'Appointment marked as no-show',
        appointment: toAppointmentJson(reservation),
      });
    }),
  );

  return router;
}
