import { describe, it, expect } from 'vitest';

import { ConfigSchema } from '@config/env.config';

import { readBookingRules } from '@services/booking/config.defaults.js';

describe('readBookingRules', () => {
  it('maps environment defaults onto the booking rules', () => {
    const cfg = ConfigSchema.parse({ JWT_SECRET: 'test-secret' });
    expect(readBookingRules(cfg)).toEqual({
      timezone: 'UTC',
      operatingHours: '09:00-17:00',
      minLeadMinutes: 120,
      maxReschedules: 2,
      rescheduleCutoffMinutes: 60,
      fees: { consultation: 2000, medication: 800 },
    });
  });

  it('caps the reschedule limit at what the store can record', () => {
    const cfg = ConfigSchema.parse({ JWT_SECRET: 'test-secret', MAX_RESCHEDULES: '5', TIMEZONE: 'Europe/Rome' });
    const rules = readBookingRules(cfg);
    expect(rules.maxReschedules).toBe(2);
    expect(rules.timezone).toBe('Europe/Rome');
  });
});

describe('ConfigSchema', () => {
  it('requires a token secret', () => {
    expect(ConfigSchema.safeParse({}).success).toBe(false);
  });

  it('reads boolean flags from strings', () => {
    expect(ConfigSchema.parse({ JWT_SECRET: 'test-secret', DIRECTORY_FAIL_OPEN: 'yes' }).DIRECTORY_FAIL_OPEN).toBe(
      true,
    );
  });

  it('rejects a malformed opening-hours value', () => {
    expect(ConfigSchema.safeParse({ JWT_SECRET: 'test-secret', OPENING_HOURS: '9 to 5' }).success).toBe(false);
  });
});
