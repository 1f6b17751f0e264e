import { DateTime } from 'luxon';

/** Half-open range `[start, end)`. */
export interface Interval {
  start: Date;
  end: Date;
}

export function intervalOf(start: Date, durationMinutes: number): Interval {
  return { start, end: new Date(start.getTime() + durationMinutes * 60_000) };
}

/** Back-to-back intervals do not overlap: the upper bound is excluded. */
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}

/**
 * Reads an ISO-8601 timestamp; one without an offset is taken as wall-clock time in `tz`.
 * Returns `null` for anything luxon cannot parse.
 */
export function parseInstant(value: string, tz: string): Date | null {
  const dt = DateTime.fromISO(value, { zone: tz });
  return dt.isValid ? dt.toJSDate() : null;
}

/** ISO-8601 in UTC with a trailing `Z`, milliseconds dropped when zero. */
export function toUtcIso(date: Date): string {
  return (
    DateTime.fromJSDate(date, { zone: 'utc' }).toISO({ suppressMilliseconds: true }) ??
    date.toISOString()
  );
}

export function minutesBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 60_000;
}
