import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { BaseError } from '@core/errors/base-error.js';

import { createLogger } from '@utils/logger.js';

const log = createLogger('http');

interface ErrorPayload {
  code: string;
  message: string;
  traceId: string;
  data?: unknown;
}

export const errorMiddleware = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const traceId = randomUUID();

  if (err instanceof ZodError) {
    const payload: ErrorPayload = {
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      traceId,
      data: { issues: err.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) },
    };
    res.status(422).json(payload);
    return;
  }

  if (err instanceof BaseError) {
    const payload: ErrorPayload = { code: err.code, message: err.message, traceId };
    if (err.data !== undefined) payload.data = err.data;
    if (err.status >= 500) log.warn({ err, traceId, path: req.path }, '[http] upstream failure');
    res.status(err.status).json(payload);
    return;
  }

  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ code: 'BAD_REQUEST', message: 'Malformed JSON body', traceId });
    return;
  }

  log.error({ err, traceId, path: req.path }, '[http] unhandled error');
  res.status(500).json({ code: 'INTERNAL_ERROR', message: 'Internal server error', traceId });
};
