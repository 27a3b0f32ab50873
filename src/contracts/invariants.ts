// Post-aggregation checks; any error here means a bug upstream, not bad data

import type { AggregatedBucket } from '../schemas.js';

export type InvariantResult = { ok: boolean; errs: string[] };

const EPS = 1e-6;
const near = (a: number, b: number) => Math.abs(a - b) <= EPS * Math.max(1, Math.abs(a), Math.abs(b));

export function validateBuckets(buckets: readonly AggregatedBucket[]): InvariantResult {
  const errs: string[] = [];
  const keys = new Set<string>();
  for (let i = 0; i < buckets.length; i++) {
    const b = buckets[i];
    const key = JSON.stringify([b.userId, b.bucket.start.toMillis(), b.market, b.ticker]);
    if (keys.has(key)) errs.push(`buckets[${i}].key.duplicate`);
    keys.add(key);
    if (b.bucket.start.toMillis() >= b.bucket.end.toMillis()) errs.push(`buckets[${i}].bounds.empty`);
    if (b.totalCount < b.buyCount + b.sellCount) errs.push(`buckets[${i}].count.total`);
    if (b.totalCount === b.buyCount + b.sellCount && !near(b.totalAmount, b.buyAmount + b.sellAmount)) {
      errs.push(`buckets[${i}].amount.total`);
    }
    if (b.buyPriceCount > b.buyCount) errs.push(`buckets[${i}].buyPrice.count`);
    if (b.sellPriceCount > b.sellCount) errs.push(`buckets[${i}].sellPrice.count`);
    if ((b.buyPriceCount === 0) !== (b.avgBuyPrice === null)) errs.push(`buckets[${i}].avgBuy.orphan`);
    if ((b.sellPriceCount === 0) !== (b.avgSellPrice === null)) errs.push(`buckets[${i}].avgSell.orphan`);
    if (b.distinctInstrumentCount < 1 || b.distinctInstrumentCount > b.totalCount) errs.push(`buckets[${i}].instruments.range`);
    if (i > 0 && b.userId === buckets[i - 1].userId && b.bucket.start.toMillis() < buckets[i - 1].bucket.start.toMillis()) {
      errs.push(`buckets[${i}].order`);
    }
  }
  return { ok: errs.length === 0, errs };
}

const SHOWN = 5;

/** Throws with the first few failed checks; `stage` names the bucket set. */
export function assertBuckets(stage: string, buckets: readonly AggregatedBucket[]): void {
  const { ok, errs } = validateBuckets(buckets);
  if (ok) return;
  const more = errs.length > SHOWN ? ` (+${errs.length - SHOWN} more)` : '';
  throw new Error(`${stage} buckets violate invariants: ${errs.slice(0, SHOWN).join(', ')}${more}`);
}
