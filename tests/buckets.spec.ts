import { describe, it, expect } from 'vitest';
import { bucketStart, enumerateBuckets, parseBucketWidth } from '../src/aggregate/buckets.js';
import { InvalidInputError } from '../src/errors.js';
import { at } from './helpers/trades.js';

const labels = (bs: { label: string }[]) => bs.map(b => b.label);

describe('bucket width', () => {
  it('accepts divisors of 24', () => {
    expect(parseBucketWidth(4)).toBe(4);
    expect(parseBucketWidth('6h')).toBe(6);
    expect(parseBucketWidth(24)).toBe(24);
  });
  it('rejects anything else', () => {
    for (const w of [0, 5, 1.5, 48, -4]) expect(() => parseBucketWidth(w)).toThrow(InvalidInputError);
  });
});

describe('bucketStart', () => {
  it('floors to the W-hour slot of the day', () => {
    const ts = at('2024-03-05 13:27:41');
    expect(bucketStart(ts, 4).toFormat('yyyy-MM-dd HH:mm:ss')).toBe('2024-03-05 12:00:00');
    expect(bucketStart(ts, 1).toFormat('HH:mm')).toBe('13:00');
    expect(bucketStart(ts, 24).toFormat('HH:mm')).toBe('00:00');
    expect(bucketStart(ts, 4, 'daily').toFormat('yyyy-MM-dd HH:mm')).toBe('2024-03-05 00:00');
  });
  it('keeps the zone of the timestamp', () => {
    const ts = at('2024-03-05 01:30:00', 'UTC');
    const b = bucketStart(ts, 4);
    expect(b.zoneName).toBe('UTC');
    expect(b.toFormat('yyyy-MM-dd HH:mm')).toBe('2024-03-05 00:00');
  });
});

describe('enumerateBuckets', () => {
  it('lists every bucket overlapping the window', () => {
    const bs = enumerateBuckets(at('2024-03-05 10:00:00'), at('2024-03-05 18:00:00'), 4);
    expect(labels(bs)).toEqual(['2024-03-05 08:00', '2024-03-05 12:00', '2024-03-05 16:00']);
  });
  it('treats the end as exclusive', () => {
    const bs = enumerateBuckets(at('2024-03-05 08:00:00'), at('2024-03-05 16:00:00'), 4);
    expect(labels(bs)).toEqual(['2024-03-05 08:00', '2024-03-05 12:00']);
    expect(bs[1].end.toFormat('HH:mm')).toBe('16:00');
  });
  it('rolls over midnight', () => {
    const bs = enumerateBuckets(at('2024-03-05 20:00:00'), at('2024-03-06 04:00:00'), 4);
    expect(labels(bs)).toEqual(['2024-03-05 20:00', '2024-03-06 00:00']);
  });
  it('uses calendar days in daily mode', () => {
    const bs = enumerateBuckets(at('2024-03-05 10:00:00'), at('2024-03-07 00:00:00'), 4, 'daily');
    expect(labels(bs)).toEqual(['2024-03-05', '2024-03-06']);
  });
  it('rejects an empty or inverted window', () => {
    const t = at('2024-03-05 10:00:00');
    expect(() => enumerateBuckets(t, t, 4)).toThrow(InvalidInputError);
    expect(() => enumerateBuckets(t, t.minus({ hours: 1 }), 4)).toThrow('start must be before end');
  });
});
