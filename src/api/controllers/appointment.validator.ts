import { z } from 'zod';

import { RESERVATION_STATUSES } from '@core/interfaces/reservation.types.js';

import { parseInstant } from '@utils/time.js';

const isoInstant = (tz: string) =>
  z.string().transform((value, ctx) => {
    const instant = parseInstant(value, tz);
    if (!instant) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an ISO-8601 timestamp' });
      return z.NEVER;
    }
    return instant;
  });

const id = z.string().trim().min(1);
const minutes = z.number().int().positive();
const version = z.number().int().positive();
const text = z.string().trim().max(2000);

export function appointmentSchemas(tz: string) {
  return {
    book: z.object({
      requester_id: id,
      provider_id: id,
      category_id: id,
      start: isoInstant(tz),
      duration_minutes: minutes.default(30),
      reason: text.optional(),
      notes: text.optional(),
    }),
    reschedule: z.object({
      expected_version: version,
      start: isoInstant(tz),
      duration_minutes: minutes.optional(),
      reason: text.optional(),
      notes: text.optional(),
    }),
    cancel: z.object({
      expected_version: version,
      reason: text.optional(),
    }),
    versioned: z.object({
      expected_version: version,
    }),
    requesterQuery: z.object({
      status: z.enum(RESERVATION_STATUSES).optional(),
    }),
    providerQuery: z.object({
      status: z.enum(RESERVATION_STATUSES).optional(),
      start_date: isoInstant(tz).optional(),
      end_date: isoInstant(tz).optional(),
    }),
  };
}
