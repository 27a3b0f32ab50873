import { InvalidInputError } from '../errors.js';
import { emitIntegrity } from '../observability/events.js';
import {
  isHeatmapMetric, isPriceMetric,
  type AggregatedBucket, type HeatmapMatrix, type HeatmapMetric, type LongFormRow, type TimeBucket, type WatchlistIdentifier,
} from '../schemas.js';
import { maybeMask, maskMid } from '../security/log_mask.js';

export function parseMetric(s: string): HeatmapMetric {
  if (!isHeatmapMetric(s)) throw new InvalidInputError(`unknown heatmap metric ${s}`);
  return s;
}

// priced rows behind an average, so merged cells average over the same rows
const priceWeight = (b: AggregatedBucket, metric: 'avgBuyPrice' | 'avgSellPrice') =>
  metric === 'avgBuyPrice' ? b.buyPriceCount : b.sellPriceCount;

type Cell = { sum: number; weight: number };

/**
 * Dense identifier x bucket grid. Rows follow the caller's order (duplicates
 * collapse to their first position), columns are `windowBuckets` as given.
 */
export function assemble(
  buckets: readonly AggregatedBucket[],
  identifiers: readonly WatchlistIdentifier[],
  windowBuckets: readonly TimeBucket[],
  metric: HeatmapMetric,
): HeatmapMatrix {
  parseMetric(metric);
  const rows = [...new Set(identifiers)];
  const rowIdx = new Map(rows.map((id, i) => [id, i]));
  const colIdx = new Map(windowBuckets.map((b, i) => [b.start.toMillis(), i]));
  const grid: Cell[][] = rows.map(() => windowBuckets.map(() => ({ sum: 0, weight: 0 })));

  const unknownUsers = new Map<string, number>();
  let outOfWindow = 0;
  for (const b of buckets) {
    const r = rowIdx.get(b.userId);
    if (r === undefined) {
      unknownUsers.set(b.userId, (unknownUsers.get(b.userId) ?? 0) + 1);
      continue;
    }
    const c = colIdx.get(b.bucket.start.toMillis());
    if (c === undefined) { outOfWindow += 1; continue; }
    const cell = grid[r][c];
    if (isPriceMetric(metric)) {
      const v = b[metric];
      if (v === null) continue;
      const w = priceWeight(b, metric);
      cell.sum += v * w;
      cell.weight += w;
    } else {
      cell.sum += b[metric];
    }
  }

  for (const [userId, count] of unknownUsers) {
    emitIntegrity({
      kind: 'unknown_user',
      message: `buckets for ${maybeMask(userId, v => (v === null ? v : maskMid(v)))} have no matrix row`,
      userId,
      count,
    });
  }
  if (outOfWindow) {
    emitIntegrity({ kind: 'out_of_window', message: 'buckets outside the requested window were left out', count: outOfWindow });
  }

  const cells = grid.map(row => row.map(cell => {
    if (!isPriceMetric(metric)) return cell.sum;
    return cell.weight > 0 ? cell.sum / cell.weight : null;
  }));
  return { metric, rows, columns: [...windowBuckets], cells };
}

/** One row per aggregated bucket, for timeline and detail tables. */
export function toLongForm(buckets: readonly AggregatedBucket[]): LongFormRow[] {
  return buckets.map(b => ({
    mid: b.userId,
    bucketStart: b.bucket.start.toFormat('yyyy-MM-dd HH:mm:ss'),
    bucketLabel: b.bucket.label,
    market: b.market,
    ticker: b.ticker,
    buyAmount: b.buyAmount,
    sellAmount: b.sellAmount,
    totalAmount: b.totalAmount,
    buyQuantity: b.buyQuantity,
    sellQuantity: b.sellQuantity,
    buyCount: b.buyCount,
    sellCount: b.sellCount,
    totalCount: b.totalCount,
    distinctInstrumentCount: b.distinctInstrumentCount,
    avgBuyPrice: b.avgBuyPrice,
    avgSellPrice: b.avgSellPrice,
  }));
}
