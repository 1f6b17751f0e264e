import { describe, it, expect } from 'vitest';

import { NotFoundError } from '@core/errors/not-found.error.js';
import { ValidationError } from '@core/errors/validation.error.js';

import { DEFAULT_BOOKING_RULES } from '@services/booking/config.defaults.js';
import { isWithinOperatingWindow, parseRange } from '@services/booking/opening-hours.util.js';
import { ValidationService } from '@services/booking/validation.service.js';

import { intervalOf } from '@utils/time.js';

import { FakeDirectory, NOW, at, bookInput } from '@test/utils/fakes.js';

function setup(rules = DEFAULT_BOOKING_RULES) {
  const directory = new FakeDirectory()
    .requester('req-1')
    .requester('req-off', false)
    .provider('prov-1', 'cardiology')
    .provider('prov-off', 'cardiology', false);
  return { directory, service: new ValidationService(directory, rules, () => NOW) };
}

async function ruleOf(p: Promise<unknown>): Promise<unknown> {
  try {
    await p;
  } catch (err) {
    if (err instanceof ValidationError) return err.data?.rule;
    throw err;
  }
  return 'passed';
}

describe('parseRange', () => {
  it('reads HH:mm-HH:mm into minutes', () => {
    expect(parseRange('09:00-17:00')).toEqual({ start: 540, end: 1020 });
  });

  it('rejects empty or inverted ranges', () => {
    expect(() => parseRange('17:00-09:00')).toThrow('Invalid operating hours range');
    expect(() => parseRange('9-17')).toThrow('Invalid operating hours range');
  });
});

describe('isWithinOperatingWindow', () => {
  const fits = (iso: string, minutes: number, tz = 'UTC') =>
    isWithinOperatingWindow(intervalOf(new Date(iso), minutes), '09:00-17:00', tz);

  it('accepts a slot that ends exactly at closing', () => {
    expect(fits('2030-06-04T16:30:00Z', 30)).toBe(true);
  });

  it('rejects slots that run past closing or start before opening', () => {
    expect(fits('2030-06-04T16:31:00Z', 30)).toBe(false);
    expect(fits('2030-06-04T08:59:00Z', 30)).toBe(false);
  });

  it('rejects a slot ending even a fraction of a second after closing', () => {
    expect(fits('2030-06-04T16:30:00.500Z', 30)).toBe(false);
    expect(fits('2030-06-04T08:59:59.999Z', 30)).toBe(false);
  });

  it('keeps wall-clock hours on a daylight-saving change day', () => {
    // Rome moves to UTC+2 on 2030-03-31
    expect(fits('2030-03-31T07:00:00Z', 30, 'Europe/Rome')).toBe(true);
    expect(fits('2030-03-31T06:59:00Z', 30, 'Europe/Rome')).toBe(false);
  });

  it('rejects slots spanning midnight', () => {
    expect(fits('2030-06-04T23:30:00Z', 60)).toBe(false);
  });

  it('evaluates the window in the configured zone', () => {
    // Rome is UTC+2 in June
    expect(fits('2030-06-04T07:00:00Z', 30, 'Europe/Rome')).toBe(true);
    expect(fits('2030-06-04T15:00:00Z', 30, 'Europe/Rome')).toBe(false);
  });
});

describe('ValidationService', () => {
  it('accepts a well-formed request inside hours and beyond the lead time', async () => {
    const { service } = setup();
    await expect(service.validateSlot(bookInput())).resolves.toBeUndefined();
  });

  it('treats exactly the minimum lead time as enough', async () => {
    const { service } = setup();
    expect(await ruleOf(service.validateSlot(bookInput({ start: at('10:00') })))).toBe('passed');
    const justShort = new Date('2030-06-03T09:59:59Z');
    expect(await ruleOf(service.validateSlot(bookInput({ start: justShort })))).toBe('lead_time');
  });

  it('enforces the operating window', async () => {
    const { service } = setup();
    expect(await ruleOf(service.validateSlot(bookInput({ start: at('16:30') })))).toBe('passed');
    expect(await ruleOf(service.validateSlot(bookInput({ start: at('16:31') })))).toBe(
      'operating_hours',
    );
  });

  it('refuses a sub-second start that pushes the end past closing', async () => {
    const { service } = setup();
    const start = new Date('2030-06-03T16:30:00.500Z');
    expect(await ruleOf(service.validateSlot(bookInput({ start })))).toBe('operating_hours');
  });

  it('rejects unknown requesters and providers with NotFoundError', async () => {
    const { service } = setup();
    await expect(service.validateSlot(bookInput({ requesterId: 'ghost' }))).rejects.toThrow(
      new NotFoundError('Requester not found'),
    );
    await expect(service.validateSlot(bookInput({ providerId: 'ghost' }))).rejects.toThrow(
      'Provider not found',
    );
  });

  it('rejects inactive participants', async () => {
    const { service } = setup();
    await expect(service.validateSlot(bookInput({ requesterId: 'req-off' }))).rejects.toThrow(
      'Requester is not active',
    );
    expect(await ruleOf(service.validateSlot(bookInput({ providerId: 'prov-off' })))).toBe(
      'identity',
    );
  });

  it('rejects a provider outside the requested category', async () => {
    const { service } = setup();
    expect(await ruleOf(service.validateSlot(bookInput({ categoryId: 'dermatology' })))).toBe(
      'category',
    );
  });

  it('skips the category check for entries the directory could not verify', async () => {
    const { directory, service } = setup();
    directory.lookup.mockImplementation(async () => ({
      exists: true,
      active: true,
      categoryId: null,
      assumed: true,
    }));
    expect(await ruleOf(service.validateSlot(bookInput({ categoryId: 'dermatology' })))).toBe(
      'passed',
    );
  });

  it('checks identity before hours and lead time', async () => {
    const { service } = setup();
    const late = new Date('2030-06-03T08:30:00Z');
    await expect(
      service.validateSlot(bookInput({ requesterId: 'ghost', start: late })),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects non-positive durations before any lookup', async () => {
    const { directory, service } = setup();
    await expect(service.validateSlot(bookInput({ durationMinutes: 0 }))).rejects.toThrow(
      'Duration must be a positive whole number of minutes',
    );
    expect(directory.lookup).not.toHaveBeenCalled();
  });
});
