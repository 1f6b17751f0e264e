import { Router } from 'express';
import jwt from 'jsonwebtoken';
import request from 'supertest';
import { describe, it, expect } from 'vitest';

import { createAuthMiddleware } from '@middleware/auth.middleware.js';

import { buildTestApp } from '@test/utils/buildTestApp.js';
import { buildService } from '@test/utils/fakes.js';

import { createApp } from '../app.js';

const SECRET = 'test-secret';
const auth = createAuthMiddleware({ secret: SECRET, algorithm: 'HS256' });

function app(databaseUp = true) {
  const { service, repository } = buildService();
  const database = databaseUp ? repository : { ping: async () => false };
  return createApp({ service, auth, timezone: 'UTC', database });
}

describe('createApp', () => {
  it('serves /health without a token', async () => {
    const res = await request(app()).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'healthy',
      service: 'appointment-service',
      checks: { database: { status: 'healthy', message: 'Database connection successful' } },
    });
    expect(typeof res.body.timestamp).toBe('string');
  });

  it('reports 503 from /health and /ready while the database is down', async () => {
    const down = app(false);
    const health = await request(down).get('/health');
    expect(health.status).toBe(503);
    expect(health.body).toMatchObject({
      status: 'unhealthy',
      checks: { database: { status: 'unhealthy', message: 'Database connection failed' } },
    });

    const ready = await request(down).get('/ready');
    expect([ready.status, ready.body.status]).toEqual([503, 'not ready']);
  });

  it('answers /ready and /live when up', async () => {
    const ready = await request(app()).get('/ready');
    expect([ready.status, ready.body.status]).toEqual([200, 'ready']);

    const live = await request(app(false)).get('/live');
    expect([live.status, live.body.status]).toEqual([200, 'alive']);
  });

  it('guards the appointment routes', async () => {
    const res = await request(app()).get('/api/v1/appointments/res-1');
    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({ code: 'UNAUTHORIZED', message: 'Token is missing' });
  });

  it('passes a valid bearer token through to the routes', async () => {
    const token = jwt.sign({ user_id: 1, role: 'admin' }, SECRET);
    const res = await request(app())
      .get('/api/v1/appointments/res-1')
      .set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(404);
  });
});

describe('createAuthMiddleware', () => {
  const router = Router();
  router.get('/me', auth, (req, res) => {
    res.json(req.caller ?? null);
  });
  const whoami = buildTestApp(router, '/');

  it('exposes the caller claims', async () => {
    const token = jwt.sign({ user_id: 7, role: 'admin', username: 'desk' }, SECRET);
    const res = await request(whoami).get('/me').set('Authorization', `Bearer ${token}`);
    expect(res.body).toEqual({ userId: '7', role: 'admin', username: 'desk' });
  });

  it('accepts a raw token without the scheme', async () => {
    const token = jwt.sign({ user_id: 'u-1' }, SECRET);
    const res = await request(whoami).get('/me').set('Authorization', token);
    expect(res.body).toEqual({ userId: 'u-1', role: 'user' });
  });

  it('tells an expired token apart from a forged one', async () => {
    const expired = jwt.sign({ user_id: 'u-1', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);
    const forged = jwt.sign({ user_id: 'u-1' }, 'other-secret');

    const a = await request(whoami).get('/me').set('Authorization', `Bearer ${expired}`);
    const b = await request(whoami).get('/me').set('Authorization', `Bearer ${forged}`);

    expect([a.status, a.body.message]).toEqual([401, 'Token has expired']);
    expect([b.status, b.body.message]).toEqual([401, 'Invalid token']);
  });

  it('rejects tokens without a user id', async () => {
    const token = jwt.sign({ role: 'admin' }, SECRET);
    const res = await request(whoami).get('/me').set('Authorization', `Bearer ${token}`);
    expect(res.body.message).toBe('Invalid token');
  });
});

describe('errorMiddleware', () => {
  it('hides unexpected errors behind a 500', async () => {
    const router = Router();
    router.get('/boom', () => {
      throw new Error('database exploded');
    });
    const res = await request(buildTestApp(router, '/')).get('/boom');
    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
});
