import { DateTime } from 'luxon';

import type { Interval } from '@utils/time.js';

function hmToMinutes(hm: string): number {
  const [h, m] = hm.split(':').map(Number);
  return (h ?? 0) * 60 + (m ?? 0);
}

/** Parses "HH:mm-HH:mm" into minutes since local midnight. */
export function parseRange(range: string): { start: number; end: number } {
  const [s = '', e = ''] = range.split('-');
  const start = hmToMinutes(s);
  const end = hmToMinutes(e);
  if (!/^\d{2}:\d{2}$/.test(s) || !/^\d{2}:\d{2}$/.test(e) || start >= end) {
    throw new Error(`Invalid operating hours range: ${range}`);
  }
  return { start, end };
}

// wall-clock time on `day`, so DST days keep their local opening hours
function atLocalMinute(day: DateTime, minutes: number): DateTime {
  if (minutes >= 24 * 60) return day.plus({ days: 1 });
  return day.set({ hour: Math.floor(minutes / 60), minute: minutes % 60 });
}

/**
 * True when `[start, end)` lies inside the window on a single local calendar day.
 * An interval ending exactly at the closing time fits.
 */
export function isWithinOperatingWindow(interval: Interval, range: string, tz: string): boolean {
  const window = parseRange(range);
  const startLocal = DateTime.fromJSDate(interval.start).setZone(tz);
  const endLocal = DateTime.fromJSDate(interval.end).setZone(tz);
  if (startLocal.toISODate() !== endLocal.toISODate()) return false;

  const day = startLocal.startOf('day');
  const open = atLocalMinute(day, window.start).toMillis();
  const close = atLocalMinute(day, window.end).toMillis();
  return interval.start.getTime() >= open && interval.end.getTime() <= close;
}
