import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt, { type Algorithm } from 'jsonwebtoken';
import { z } from 'zod';

import { UnauthorizedError } from '@core/errors/unauthorized.error.js';

const Claims = z.object({
  user_id: z.union([z.string(), z.number()]).transform(String),
  role: z.string().default('user'),
  username: z.string().optional(),
});

export interface AuthOptions {
  secret: string;
  algorithm: Algorithm;
}

function bearerToken(req: Request): string | null {
  const header = req.header('authorization');
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  if (token === undefined) return scheme || null;
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
}

/** Verifies the bearer token and exposes the caller on `req.caller`; the core never sees it. */
export function createAuthMiddleware(opts: AuthOptions): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = bearerToken(req);
    if (!token) {
      next(new UnauthorizedError('Token is missing'));
      return;
    }
    try {
      const decoded = jwt.verify(token, opts.secret, { algorithms: [opts.algorithm] });
      const claims = Claims.safeParse(decoded);
      if (!claims.success) {
        next(new UnauthorizedError('Invalid token'));
        return;
      }
      req.caller = {
        userId: claims.data.user_id,
        role: claims.data.role,
        username: claims.data.username,
      };
      next();
    } catch (err) {
      next(
        new UnauthorizedError(
          err instanceof jwt.TokenExpiredError ? 'Token has expired' : 'Invalid token',
        ),
      );
    }
  };
}
