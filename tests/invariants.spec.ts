import { describe, it, expect } from 'vitest';
import { aggregate } from '../src/aggregate/aggregator.js';
import { assertBuckets, validateBuckets } from '../src/contracts/invariants.js';
import { sampleTrades } from './helpers/trades.js';

describe('bucket invariants', () => {
  const out = aggregate(sampleTrades(), 4);

  it('accepts aggregator output', () => {
    expect(validateBuckets(out)).toEqual({ ok: true, errs: [] });
    expect(() => assertBuckets('intraday', out)).not.toThrow();
  });

  it('flags an average without priced rows behind it', () => {
    expect(validateBuckets([{ ...out[0], avgBuyPrice: null }]).errs).toEqual(['buckets[0].avgBuy.orphan']);
    expect(validateBuckets([{ ...out[1], buyPriceCount: 2 }]).errs).toEqual(['buckets[0].buyPrice.count', 'buckets[0].avgBuy.orphan']);
  });

  it('names the stage and the first failed checks', () => {
    expect(() => assertBuckets('daily', [out[0], out[0]])).toThrow('daily buckets violate invariants: buckets[1].key.duplicate');
    const many = Array.from({ length: 7 }, () => out[0]);
    expect(() => assertBuckets('intraday', many)).toThrow(
      'intraday buckets violate invariants: buckets[1].key.duplicate, buckets[2].key.duplicate, '
      + 'buckets[3].key.duplicate, buckets[4].key.duplicate, buckets[5].key.duplicate (+1 more)',
    );
  });
});
