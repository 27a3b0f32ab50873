import { InvalidInputError } from '../errors.js';
import { emitIntegrity } from '../observability/events.js';
import { BUY, SELL, type AggregatedBucket, type Granularity, type TimeBucket, type TradeFact } from '../schemas.js';
import { bucketStart, makeBucket, parseBucketWidth } from './buckets.js';

type Acc = {
  userId: string;
  bucket: TimeBucket;
  market: string | null;
  ticker: string | null;
  buyAmount: number;
  sellAmount: number;
  otherAmount: number;
  buyQuantity: number;
  sellQuantity: number;
  buyCount: number;
  sellCount: number;
  otherCount: number;
  buyPriceSum: number;
  buyPriceN: number;
  sellPriceSum: number;
  sellPriceN: number;
  tickers: Set<string>;
};

type Update = (acc: Acc, f: TradeFact) => void;

// category -> accumulator update; anything else falls through to `other`
const UPDATES: Record<number, Update> = {
  [BUY]: (acc, f) => {
    acc.buyAmount += f.amount;
    acc.buyQuantity += f.quantity;
    acc.buyCount += 1;
    if (f.price !== null) { acc.buyPriceSum += f.price; acc.buyPriceN += 1; }
  },
  [SELL]: (acc, f) => {
    acc.sellAmount += f.amount;
    acc.sellQuantity += f.quantity;
    acc.sellCount += 1;
    if (f.price !== null) { acc.sellPriceSum += f.price; acc.sellPriceN += 1; }
  },
};

const other: Update = (acc, f) => {
  acc.otherAmount += f.amount;
  acc.otherCount += 1;
};

function checkFact(f: TradeFact, index: number): void {
  const bad = (field: string) => new InvalidInputError(`trade fact #${index} has a malformed ${field}`, { index, userId: f.userId });
  if (!f.tradedAt.isValid) throw bad('timestamp');
  if (!Number.isFinite(f.amount)) throw bad('amount');
  if (!Number.isFinite(f.quantity)) throw bad('quantity');
  if (f.price !== null && !Number.isFinite(f.price)) throw bad('price');
}

function newAcc(userId: string, bucket: TimeBucket, market: string | null, ticker: string | null): Acc {
  return {
    userId, bucket, market, ticker,
    buyAmount: 0, sellAmount: 0, otherAmount: 0,
    buyQuantity: 0, sellQuantity: 0,
    buyCount: 0, sellCount: 0, otherCount: 0,
    buyPriceSum: 0, buyPriceN: 0, sellPriceSum: 0, sellPriceN: 0,
    tickers: new Set(),
  };
}

function finalise(a: Acc): AggregatedBucket {
  return {
    userId: a.userId,
    bucket: a.bucket,
    market: a.market,
    ticker: a.ticker,
    buyAmount: a.buyAmount,
    sellAmount: a.sellAmount,
    totalAmount: a.buyAmount + a.sellAmount + a.otherAmount,
    buyQuantity: a.buyQuantity,
    sellQuantity: a.sellQuantity,
    buyCount: a.buyCount,
    sellCount: a.sellCount,
    totalCount: a.buyCount + a.sellCount + a.otherCount,
    distinctInstrumentCount: a.tickers.size,
    avgBuyPrice: a.buyPriceN ? a.buyPriceSum / a.buyPriceN : null,
    avgSellPrice: a.sellPriceN ? a.sellPriceSum / a.sellPriceN : null,
    buyPriceCount: a.buyPriceN,
    sellPriceCount: a.sellPriceN,
  };
}

const cmp = (a: string | null, b: string | null) => {
  const x = a ?? '';
  const y = b ?? '';
  return x < y ? -1 : x > y ? 1 : 0;
};

export function compareBuckets(a: AggregatedBucket, b: AggregatedBucket): number {
  return cmp(a.userId, b.userId)
    || a.bucket.start.toMillis() - b.bucket.start.toMillis()
    || cmp(a.market, b.market)
    || cmp(a.ticker, b.ticker);
}

/**
 * Groups trade facts into buckets and computes per-bucket metrics.
 * Intraday groups by (userId, W-hour slot); daily by (userId, day, market, ticker).
 * Any malformed fact rejects the whole batch.
 */
export function aggregate(facts: readonly TradeFact[], bucketWidthHours: number, granularity: Granularity = 'intraday'): AggregatedBucket[] {
  const width = parseBucketWidth(bucketWidthHours);
  facts.forEach(checkFact);

  const groups = new Map<string, Acc>();
  const unknown = new Map<number, number>();
  for (const f of facts) {
    const start = bucketStart(f.tradedAt, width, granularity);
    const daily = granularity === 'daily';
    const market = daily ? f.market : null;
    const ticker = daily ? f.ticker : null;
    const key = JSON.stringify([f.userId, start.toMillis(), market, ticker]);
    let acc = groups.get(key);
    if (!acc) {
      acc = newAcc(f.userId, makeBucket(start, width, granularity), market, ticker);
      groups.set(key, acc);
    }
    const update = UPDATES[f.category];
    if (update) update(acc, f);
    else {
      other(acc, f);
      unknown.set(f.category, (unknown.get(f.category) ?? 0) + 1);
    }
    acc.tickers.add(f.ticker);
  }

  for (const [category, count] of unknown) {
    emitIntegrity({ kind: 'unknown_category', message: `trade category ${category} is neither buy nor sell`, count });
  }

  return [...groups.values()].map(finalise).sort(compareBuckets);
}
