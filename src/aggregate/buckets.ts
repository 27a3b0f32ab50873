import type { DateTime } from 'luxon';
import { InvalidInputError } from '../errors.js';
import type { Granularity, TimeBucket } from '../schemas.js';

export const BUCKET_WIDTHS = [1, 2, 3, 4, 6, 8, 12, 24] as const;

/** Accepts whole hours that divide a day evenly. */
export function parseBucketWidth(w: number | string): number {
  const n = typeof w === 'string' ? Number(w.trim().replace(/h$/i, '')) : w;
  if (!Number.isInteger(n) || n < 1 || n > 24 || 24 % n !== 0) {
    throw new InvalidInputError(`unsupported bucket width ${String(w)}; must divide 24 (${BUCKET_WIDTHS.join('/')})`);
  }
  return n;
}

export function validateWindow(start: DateTime, end: DateTime): void {
  if (!start.isValid || !end.isValid) throw new InvalidInputError('time window has an invalid bound');
  if (start.toMillis() >= end.toMillis()) {
    throw new InvalidInputError('time window start must be before end', { start: start.toISO(), end: end.toISO() });
  }
}

/** day_floor(ts) + W * floor(hour(ts) / W), on the wall clock of the timestamp's zone. */
export function bucketStart(ts: DateTime, widthHours: number, granularity: Granularity = 'intraday'): DateTime {
  const day = ts.startOf('day');
  if (granularity === 'daily' || widthHours === 24) return day;
  return day.set({ hour: widthHours * Math.floor(ts.hour / widthHours) });
}

export function bucketLabel(start: DateTime, granularity: Granularity): string {
  return granularity === 'daily' ? start.toFormat('yyyy-MM-dd') : start.toFormat('yyyy-MM-dd HH:mm');
}

export function makeBucket(start: DateTime, widthHours: number, granularity: Granularity): TimeBucket {
  let end: DateTime;
  if (granularity === 'daily' || start.hour + widthHours >= 24) end = start.startOf('day').plus({ days: 1 });
  else end = start.set({ hour: start.hour + widthHours });
  return { start, end, label: bucketLabel(start, granularity) };
}

/** Every bucket overlapping [start, end), in order, including ones with no data. */
export function enumerateBuckets(start: DateTime, end: DateTime, widthHours: number, granularity: Granularity = 'intraday'): TimeBucket[] {
  validateWindow(start, end);
  const w = parseBucketWidth(widthHours);
  const stop = end.setZone(start.zone).toMillis();
  const out: TimeBucket[] = [];
  let b = makeBucket(bucketStart(start, w, granularity), w, granularity);
  while (b.start.toMillis() < stop) {
    out.push(b);
    b = makeBucket(b.end, w, granularity);
  }
  return out;
}
